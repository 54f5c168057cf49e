/**
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { type Device, Property } from 'gateway-addon';
import { SnapshotError } from '../errors';
import { type SensorAttributes, type SensorValue, UNKNOWN } from '../snapshot';
import type { SensorDescription } from './sensor-description';
import type { SensorEntity } from './sensor-entity';

export type PropertyDescription = ConstructorParameters<typeof Property>[2];

export function propertySchemaFor(description: SensorDescription): PropertyDescription {
  const { title } = description;

  switch (description.deviceClass) {
    case 'battery':
      return {
        '@type': 'LevelProperty',
        title,
        type: 'integer',
        unit: 'percent',
        readOnly: true,
        minimum: 0,
        maximum: 100,
      };
    case 'power':
      return {
        '@type': 'InstantaneousPowerProperty',
        title,
        type: 'number',
        unit: 'watt',
        readOnly: true,
      };
    case 'energy_storage':
      return {
        title,
        type: 'number',
        unit: 'watt hour',
        readOnly: true,
      };
  }

  return {
    '@type': 'BooleanProperty',
    title,
    type: 'boolean',
    readOnly: true,
  };
}

export class SensorProperty extends Property<SensorValue | null> {
  private available = true;

  constructor(device: Device, private entity: SensorEntity) {
    super(device, entity.key, propertySchemaFor(entity.description));
    entity.bind(() => this.refresh());
  }

  get uniqueId(): string {
    return this.entity.uniqueId;
  }

  get attributes(): SensorAttributes {
    return this.entity.currentAttributes();
  }

  isAvailable(): boolean {
    return this.available;
  }

  /**
   * Republishes the value projected from the latest snapshot. A snapshot
   * this sensor cannot read marks only this sensor unavailable and clears
   * its value on the gateway.
   */
  refresh(): void {
    let value: SensorValue | null | typeof UNKNOWN;

    try {
      value = this.entity.currentValue();
    } catch (e) {
      if (!(e instanceof SnapshotError)) {
        throw e;
      }

      if (this.available) {
        console.warn(`Sensor ${this.entity.uniqueId} is unavailable: ${e.message}`);
        this.available = false;
      }

      this.setCachedValueAndNotify(null);
      return;
    }

    if (!this.available) {
      console.log(`Sensor ${this.entity.uniqueId} is available again`);
      this.available = true;
    }

    if (value === UNKNOWN) {
      return;
    }

    this.setCachedValueAndNotify(value);
  }

  dispose(): void {
    this.entity.dispose();
  }
}
