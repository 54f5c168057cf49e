/**
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { SensorStateError } from '../errors';
import { type SensorAttributes, type SensorValue, UNKNOWN, type Unknown } from '../snapshot';
import type { DeviceMetadata, Unsubscribe, UpdateSource } from '../update-source';
import { describeAttributes, type SensorDescription } from './sensor-description';

export type SensorEntityState = 'unbound' | 'bound' | 'disposed';

/**
 * Binds one sensor description to the update source of one device. The
 * value is never cached here; every read projects the latest snapshot.
 */
export class SensorEntity {
  readonly uniqueId: string;

  private unsubscribe?: Unsubscribe;

  private state: SensorEntityState = 'unbound';

  constructor(readonly description: SensorDescription, private source: UpdateSource) {
    this.uniqueId = `${source.deviceIdentity()}_${description.key}`;
  }

  get key(): string {
    return this.description.key;
  }

  getState(): SensorEntityState {
    return this.state;
  }

  getDeviceMetadata(): DeviceMetadata {
    return this.source.deviceMetadata();
  }

  currentValue(): SensorValue | null | Unknown {
    const snapshot = this.source.latestSnapshot();

    if (!snapshot) {
      return UNKNOWN;
    }

    return this.description.valueFn(snapshot);
  }

  currentAttributes(): SensorAttributes {
    const snapshot = this.source.latestSnapshot();

    if (!snapshot) {
      return {};
    }

    return describeAttributes(this.description, snapshot);
  }

  bind(onUpdate: (entity: SensorEntity) => void): void {
    if (this.state !== 'unbound') {
      throw new SensorStateError(`Cannot bind ${this.uniqueId} while ${this.state}`);
    }

    this.unsubscribe = this.source.subscribe(() => onUpdate(this));
    this.state = 'bound';
  }

  dispose(): void {
    if (this.state === 'disposed') {
      return;
    }

    this.unsubscribe?.();
    this.unsubscribe = undefined;
    this.state = 'disposed';
  }
}
