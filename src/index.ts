/**
 * index.ts - Loads the MaxStorage Ultimate sensor adapter.
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import type { AddonManagerProxy } from 'gateway-addon';
import { loadConfig } from './config';
import { MaxStorageAdapter } from './maxstorage-adapter';
import type { UpdateSource } from './update-source';
import manifest from '../manifest.json';

export * from './errors';
export * from './snapshot';
export * from './update-source';
export * from './sensors/sensor-description';
export * from './sensors/sensor-entity';
export * from './sensors/sensor-property';
export * from './sensors/sensor-types';
export type { Config } from './config';
export { parseConfig } from './config';
export { MaxStorageAdapter } from './maxstorage-adapter';
export { MaxStorageDevice } from './maxstorage-device';

/**
 * Creates the adapter and sets up one device per update source.
 */
export async function createMaxStorageAdapter(
  addonManager: AddonManagerProxy,
  sources: UpdateSource[]
): Promise<MaxStorageAdapter> {
  const config = await loadConfig(manifest.id);
  const adapter = new MaxStorageAdapter(addonManager, config);

  for (const source of sources) {
    adapter.setupEntry(source);
  }

  return adapter;
}
