/**
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { EventEmitter } from 'events';
import type { Snapshot } from './snapshot';

export type Unsubscribe = () => void;

export interface DeviceMetadata {
  manufacturer: string;
  model: string;
  name?: string;
  swVersion?: string;
}

/**
 * The polling side of a storage system. Implementations own fetching,
 * retries and staleness; sensors only read the latest snapshot and listen
 * for completed update cycles.
 */
export interface UpdateSource {
  latestSnapshot(): Snapshot | undefined;

  /**
   * The listener runs once per completed update cycle, successful or not.
   */
  subscribe(listener: () => void): Unsubscribe;

  deviceIdentity(): string;

  deviceMetadata(): DeviceMetadata;
}

const UPDATED = 'updated';

/**
 * An update source that a coordinator pushes snapshots into.
 */
export class SnapshotStore implements UpdateSource {
  private snapshot: Snapshot | undefined;

  private emitter = new EventEmitter();

  constructor(private identity: string, private metadata: DeviceMetadata) {
    this.emitter.setMaxListeners(0);
  }

  latestSnapshot(): Snapshot | undefined {
    return this.snapshot;
  }

  subscribe(listener: () => void): Unsubscribe {
    this.emitter.on(UPDATED, listener);
    return () => {
      this.emitter.off(UPDATED, listener);
    };
  }

  deviceIdentity(): string {
    return this.identity;
  }

  deviceMetadata(): DeviceMetadata {
    return this.metadata;
  }

  publish(snapshot: Snapshot): void {
    this.snapshot = Object.freeze({ ...snapshot });
    this.emitter.emit(UPDATED);
  }

  /**
   * Ends an update cycle that produced no new snapshot.
   */
  markFailed(): void {
    this.emitter.emit(UPDATED);
  }

  listenerCount(): number {
    return this.emitter.listenerCount(UPDATED);
  }
}
