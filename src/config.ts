/**
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { Database } from 'gateway-addon';
import { isSection } from './snapshot';

export interface Config {
  excludedSensors?: string[];
}

export function parseConfig(raw: unknown): Config {
  if (raw === undefined || raw === null) {
    return {};
  }

  if (!isSection(raw)) {
    throw new Error(`Expected config to be an object but was ${typeof raw}`);
  }

  const config: Config = {};
  const { excludedSensors } = raw;

  if (excludedSensors !== undefined) {
    if (
      !Array.isArray(excludedSensors) ||
      !excludedSensors.every((key): key is string => typeof key === 'string')
    ) {
      throw new Error(`Expected 'excludedSensors' to be a list of sensor keys`);
    }

    config.excludedSensors = excludedSensors;
  }

  return config;
}

export async function loadConfig(packageName: string): Promise<Config> {
  const db = new Database(packageName);
  await db.open();

  try {
    return parseConfig(await db.loadConfig());
  } finally {
    db.close();
  }
}
