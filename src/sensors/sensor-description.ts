/**
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { DuplicateSensorKeyError } from '../errors';
import type { Snapshot, SensorAttributes, SensorValue } from '../snapshot';

export type SensorUnit = '%' | 'W' | 'Wh';

export type SensorStateClass = 'measurement' | 'total' | 'total_increasing';

export type SensorDeviceClass = 'battery' | 'energy_storage' | 'power';

export type SensorEntityCategory = 'diagnostic';

export interface SensorDescription {
  readonly key: string;
  readonly translationKey: string;
  readonly title: string;
  readonly icon: string;
  readonly unit?: SensorUnit;
  readonly stateClass?: SensorStateClass;
  readonly deviceClass?: SensorDeviceClass;
  readonly entityCategory?: SensorEntityCategory;
  readonly valueFn: (snapshot: Snapshot) => SensorValue | null;
  readonly attrFn?: (snapshot: Snapshot) => SensorAttributes;
}

export function describeAttributes(
  description: SensorDescription,
  snapshot: Snapshot
): SensorAttributes {
  return description.attrFn ? description.attrFn(snapshot) : {};
}

export function assertUniqueKeys(descriptions: readonly SensorDescription[]): void {
  const seen = new Set<string>();

  for (const { key } of descriptions) {
    if (seen.has(key)) {
      throw new DuplicateSensorKeyError(key);
    }

    seen.add(key);
  }
}
