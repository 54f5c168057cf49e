/**
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

/**
 * Raised by a projection that cannot read what it needs from a snapshot.
 */
export class SnapshotError extends Error {
  constructor(message: string, public readonly key: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingFieldError extends SnapshotError {
  constructor(key: string) {
    super(`Snapshot is missing field '${key}'`, key);
  }
}

export class UnexpectedFieldTypeError extends SnapshotError {
  constructor(key: string, expected: string, actual: unknown) {
    super(`Expected field '${key}' to be ${expected} but was ${describeType(actual)}`, key);
  }
}

export class DuplicateSensorKeyError extends Error {
  constructor(public readonly key: string) {
    super(`Sensor key '${key}' is declared more than once`);
    this.name = new.target.name;
  }
}

export class DuplicateDeviceError extends Error {
  constructor(public readonly identity: string) {
    super(`Device ${identity} is already set up`);
    this.name = new.target.name;
  }
}

export class SensorStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  return Array.isArray(value) ? 'array' : typeof value;
}
