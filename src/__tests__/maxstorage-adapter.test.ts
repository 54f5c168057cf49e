/**
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { AddonManagerProxy } from 'gateway-addon';
import { DuplicateDeviceError } from '../errors';
import { MaxStorageAdapter } from '../maxstorage-adapter';
import type { Snapshot } from '../snapshot';
import { FakeAddonManager } from '../test-support/gateway-addon-fake';
import { SnapshotStore } from '../update-source';

vi.mock('gateway-addon', () => import('../test-support/gateway-addon-fake'));

const metadata = { manufacturer: 'Solar Test GmbH', model: 'Ultimate 10' };

const measurements: Snapshot = {
  batterySoC: 87,
  batteryCapacity: 10240,
  batteryPower: 1500,
  gridPower: -320,
  usagePower: 640,
  plantPower: 2460,
  storageDCPower: 1480,
  storageMPPT1Power: 1300,
  storageMPPT2Power: 1160,
};

const specialState = {
  deviceInUpdate: 'false',
  dcSwitchOff: 'false',
  gridCodeUnknown: 'false',
  inWinterMode: 'true',
  inBMZEqualization: 'false',
  inPeakShaving: 'false',
  inOptimizationLimit: 'false',
  inBatteryCalibration: 'false',
  noPowerMeter: 'false',
  gridError: 'false',
  gridLocked: 'false',
  islandActive: 'false',
  serviceMode: 'false',
};

describe('MaxStorageAdapter', () => {
  let manager: FakeAddonManager;

  function createAdapter(excludedSensors?: string[]): MaxStorageAdapter {
    return new MaxStorageAdapter(manager as unknown as AddonManagerProxy, { excludedSensors });
  }

  beforeEach(() => {
    manager = new FakeAddonManager();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('registers itself with the add-on manager', () => {
    const adapter = createAdapter();

    expect(manager.adapters).toHaveLength(1);
    expect(manager.adapters[0]).toBe(adapter);
  });

  it('registers all sensors of a storage system as one device', () => {
    const adapter = createAdapter();
    const store = new SnapshotStore('SN-1', metadata);

    const storage = adapter.setupEntry(store);

    expect(manager.added).toHaveLength(1);
    expect(manager.added[0]).toBe(storage);
    expect(storage.getId()).toBe('maxstorage-SN-1');
    expect(storage.getTitle()).toBe('Solar Test GmbH Ultimate 10');
    expect(storage.getTypes()).toEqual(['EnergyMonitor', 'BinarySensor']);
    expect(storage.getIdentity()).toBe('SN-1');
    expect(storage.getSensorProperties()).toHaveLength(22);
    expect(store.listenerCount()).toBe(22);
    expect(adapter.getStorage('SN-1')).toBe(storage);
  });

  it('prefers the configured device name as title', () => {
    const adapter = createAdapter();

    const storage = adapter.setupEntry(
      new SnapshotStore('SN-1', { ...metadata, name: 'Garage Storage' })
    );

    expect(storage.getTitle()).toBe('Garage Storage');
  });

  it('derives unique ids from the device identity', () => {
    const adapter = createAdapter();

    const first = adapter.setupEntry(new SnapshotStore('SN-1', metadata));
    const second = adapter.setupEntry(new SnapshotStore('SN-2', metadata));

    expect(first.getSensorProperties()[0].uniqueId).toBe('SN-1_batterySoC');
    expect(second.getSensorProperties()[0].uniqueId).toBe('SN-2_batterySoC');
  });

  it('publishes nothing before the first snapshot', () => {
    const adapter = createAdapter();
    const storage = adapter.setupEntry(new SnapshotStore('SN-1', metadata));

    expect(manager.notifications).toEqual([]);
    expect(storage.getSensorProperties().every((property) => property.isAvailable())).toBe(true);
  });

  it('publishes the current snapshot when set up', () => {
    const adapter = createAdapter();
    const store = new SnapshotStore('SN-1', metadata);
    store.publish({ ...measurements, SpecialState: specialState });

    adapter.setupEntry(store);

    expect(manager.notifications).toHaveLength(22);
    expect(manager.notifications[0]).toEqual({
      device: 'maxstorage-SN-1',
      name: 'batterySoC',
      value: 87,
    });
    expect(manager.notifications).toContainEqual({
      device: 'maxstorage-SN-1',
      name: 'inWinterMode',
      value: true,
    });
  });

  it('announces the device before publishing its first values', () => {
    const adapter = createAdapter();
    const store = new SnapshotStore('SN-1', metadata);
    store.publish({ ...measurements, SpecialState: specialState });

    adapter.setupEntry(store);

    expect(manager.events).toHaveLength(23);
    expect(manager.events[0]).toBe('added maxstorage-SN-1');
    expect(manager.events[1]).toBe('changed maxstorage-SN-1 batterySoC');
  });

  it('keeps the measurements updating when the special state block is missing', () => {
    const adapter = createAdapter();
    const store = new SnapshotStore('SN-1', metadata);
    const storage = adapter.setupEntry(store);

    store.publish(measurements);

    expect(manager.notifications).toHaveLength(22);
    expect(manager.notifications).toContainEqual({
      device: 'maxstorage-SN-1',
      name: 'islandActive',
      value: null,
    });
    expect(manager.notifications).toContainEqual({
      device: 'maxstorage-SN-1',
      name: 'batteryPower',
      value: 1500,
    });
    expect(console.warn).toHaveBeenCalledTimes(13);

    const unavailable = storage
      .getSensorProperties()
      .filter((property) => !property.isAvailable())
      .map((property) => property.getName());

    expect(unavailable).toEqual(Object.keys(specialState));
  });

  it('leaves out excluded sensors', () => {
    const adapter = createAdapter(['serviceMode', 'gridError']);

    const storage = adapter.setupEntry(new SnapshotStore('SN-1', metadata));
    const names = storage.getSensorProperties().map((property) => property.getName());

    expect(names).toHaveLength(20);
    expect(names).not.toContain('serviceMode');
    expect(names).not.toContain('gridError');
  });

  it('refuses to set up the same storage system twice', () => {
    const adapter = createAdapter();
    const first = adapter.setupEntry(new SnapshotStore('SN-1', metadata));

    expect(() => adapter.setupEntry(new SnapshotStore('SN-1', metadata))).toThrow(
      new DuplicateDeviceError('SN-1')
    );
    expect(manager.added).toHaveLength(1);
    expect(manager.added[0]).toBe(first);
    expect(adapter.getStorage('SN-1')).toBe(first);
  });

  it('releases the subscriptions of an unloaded storage system', () => {
    const adapter = createAdapter();
    const store = new SnapshotStore('SN-1', metadata);
    const storage = adapter.setupEntry(store);

    expect(adapter.unloadEntry('SN-1')).toBe(true);
    store.publish({ ...measurements, SpecialState: specialState });

    expect(store.listenerCount()).toBe(0);
    expect(manager.removed).toHaveLength(1);
    expect(manager.removed[0]).toBe(storage);
    expect(manager.notifications).toEqual([]);
    expect(adapter.getStorage('SN-1')).toBeUndefined();
    expect(adapter.unloadEntry('SN-1')).toBe(false);
  });

  it('removes every storage system when unloaded', async () => {
    const adapter = createAdapter();
    const first = new SnapshotStore('SN-1', metadata);
    const second = new SnapshotStore('SN-2', metadata);
    adapter.setupEntry(first);
    adapter.setupEntry(second);

    await adapter.unload();

    expect(manager.removed).toHaveLength(2);
    expect(manager.unloaded).toEqual(['maxstorage-ultimate-adapter']);
    expect(first.listenerCount()).toBe(0);
    expect(second.listenerCount()).toBe(0);
  });
});
