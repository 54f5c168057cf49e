/**
 *
 * MaxStorageAdapter - exposes MaxStorage Ultimate storage systems as sensors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { Adapter, type AddonManagerProxy } from 'gateway-addon';
import type { Config } from './config';
import { DuplicateDeviceError } from './errors';
import { MaxStorageDevice } from './maxstorage-device';
import { assertUniqueKeys } from './sensors/sensor-description';
import { selectSensorTypes } from './sensors/sensor-types';
import type { UpdateSource } from './update-source';
import manifest from '../manifest.json';

export class MaxStorageAdapter extends Adapter {
  private storages: Record<string, MaxStorageDevice> = {};

  constructor(addonManager: AddonManagerProxy, private sensorConfig: Config = {}) {
    super(addonManager, manifest.id, manifest.id);

    addonManager.addAdapter(this);
  }

  /**
   * Creates every sensor of one storage system and registers them with the
   * gateway as a single device.
   */
  setupEntry(source: UpdateSource): MaxStorageDevice {
    const identity = source.deviceIdentity();

    if (this.storages[identity]) {
      throw new DuplicateDeviceError(identity);
    }

    const descriptions = selectSensorTypes(this.sensorConfig.excludedSensors);
    assertUniqueKeys(descriptions);

    const storage = new MaxStorageDevice(this, source, descriptions);

    /* eslint-disable max-len */
    console.log(
      `Created new ${storage.constructor.name} ${storage.getTitle()} (${storage.getId()}) with ${descriptions.length} sensors`
    );

    this.storages[identity] = storage;
    this.handleDeviceAdded(storage);
    storage.refresh();

    return storage;
  }

  unloadEntry(identity: string): boolean {
    const storage = this.storages[identity];

    if (!storage) {
      return false;
    }

    storage.dispose();
    delete this.storages[identity];
    this.handleDeviceRemoved(storage);
    console.log(`Removed ${storage.getTitle()} (${storage.getId()})`);

    return true;
  }

  getStorage(identity: string): MaxStorageDevice | undefined {
    return this.storages[identity];
  }

  async unload(): Promise<void> {
    for (const identity of Object.keys(this.storages)) {
      this.unloadEntry(identity);
    }

    await super.unload();
  }
}
