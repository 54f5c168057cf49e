/**
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

/**
 * In-process stand-ins for the gateway-addon classes, loaded by the tests
 * through vi.mock('gateway-addon').
 */

export interface PropertyNotification {
  device: string;
  name: string;
  value: unknown;
}

export class FakeAddonManager {
  adapters: Adapter[] = [];

  added: Device[] = [];

  removed: Device[] = [];

  notifications: PropertyNotification[] = [];

  unloaded: string[] = [];

  events: string[] = [];

  addAdapter(adapter: Adapter): void {
    this.adapters.push(adapter);
  }

  handleDeviceAdded(device: Device): void {
    this.added.push(device);
    this.events.push(`added ${device.getId()}`);
  }

  handleDeviceRemoved(device: Device): void {
    this.removed.push(device);
  }

  sendPropertyChangedNotification(property: Property<unknown>): void {
    this.events.push(`changed ${property.getDevice().getId()} ${property.getName()}`);
    this.notifications.push({
      device: property.getDevice().getId(),
      name: property.getName(),
      value: property.peekValue(),
    });
  }
}

export class Adapter {
  private devicesById: Record<string, Device> = {};

  constructor(private manager: FakeAddonManager, private id: string, private packageName: string) {}

  getManager(): FakeAddonManager {
    return this.manager;
  }

  getId(): string {
    return this.id;
  }

  getPackageName(): string {
    return this.packageName;
  }

  getDevices(): Record<string, Device> {
    return this.devicesById;
  }

  handleDeviceAdded(device: Device): void {
    this.devicesById[device.getId()] = device;
    this.manager.handleDeviceAdded(device);
  }

  handleDeviceRemoved(device: Device): void {
    delete this.devicesById[device.getId()];
    this.manager.handleDeviceRemoved(device);
  }

  async unload(): Promise<void> {
    this.manager.unloaded.push(this.id);
  }
}

export class Device {
  private title = '';

  private types: string[] = [];

  private propertiesByName = new Map<string, Property<unknown>>();

  constructor(private adapter: Adapter, private id: string) {}

  getId(): string {
    return this.id;
  }

  getTitle(): string {
    return this.title;
  }

  setTitle(title: string): void {
    this.title = title;
  }

  getTypes(): string[] {
    return this.types;
  }

  addProperty(property: Property<unknown>): void {
    this.propertiesByName.set(property.getName(), property);
  }

  findProperty(name: string): Property<unknown> | null {
    return this.propertiesByName.get(name) ?? null;
  }

  notifyPropertyChanged(property: Property<unknown>): void {
    this.adapter.getManager().sendPropertyChangedNotification(property);
  }
}

export class Property<T> {
  private value?: T;

  constructor(
    private device: Device,
    private name: string,
    private schema: Record<string, unknown>
  ) {}

  getDevice(): Device {
    return this.device;
  }

  getName(): string {
    return this.name;
  }

  getSchema(): Record<string, unknown> {
    return this.schema;
  }

  peekValue(): T | undefined {
    return this.value;
  }

  async getValue(): Promise<T | undefined> {
    return this.value;
  }

  setCachedValueAndNotify(value: T): boolean {
    const changed = this.value !== value;
    this.value = value;

    if (changed) {
      this.device.notifyPropertyChanged(this);
    }

    return changed;
  }
}

export class Database {
  static configs: Record<string, unknown> = {};

  static closed: string[] = [];

  constructor(private packageName: string) {}

  async open(): Promise<void> {
    return;
  }

  async loadConfig(): Promise<unknown> {
    return Database.configs[this.packageName];
  }

  close(): void {
    Database.closed.push(this.packageName);
  }
}
