/**
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { Device } from 'gateway-addon';
import type { MaxStorageAdapter } from './maxstorage-adapter';
import type { SensorDescription } from './sensors/sensor-description';
import { SensorEntity } from './sensors/sensor-entity';
import { SensorProperty } from './sensors/sensor-property';
import type { DeviceMetadata, UpdateSource } from './update-source';

export function deviceIdFor(identity: string): string {
  return `maxstorage-${identity}`;
}

export function deviceTitleFor({ manufacturer, model, name }: DeviceMetadata): string {
  return name ?? `${manufacturer} ${model}`;
}

export class MaxStorageDevice extends Device {
  private sensorProperties: SensorProperty[] = [];

  constructor(
    adapter: MaxStorageAdapter,
    private source: UpdateSource,
    descriptions: readonly SensorDescription[]
  ) {
    super(adapter, deviceIdFor(source.deviceIdentity()));
    this.setTitle(deviceTitleFor(source.deviceMetadata()));
    this.getTypes().push('EnergyMonitor');
    this.getTypes().push('BinarySensor');

    for (const description of descriptions) {
      const property = new SensorProperty(this, new SensorEntity(description, source));
      this.sensorProperties.push(property);
      this.addProperty(property);
    }
  }

  getIdentity(): string {
    return this.source.deviceIdentity();
  }

  getSensorProperties(): SensorProperty[] {
    return [...this.sensorProperties];
  }

  refresh(): void {
    for (const property of this.sensorProperties) {
      property.refresh();
    }
  }

  dispose(): void {
    for (const property of this.sensorProperties) {
      property.dispose();
    }
  }
}
