/**
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { MissingFieldError, UnexpectedFieldTypeError } from './errors';

/**
 * One state payload as fetched from the storage system, e.g.
 * `{ batterySoC: 87, batteryPower: -1500, SpecialState: { islandActive: 'false' } }`.
 */
export type Snapshot = Readonly<Record<string, unknown>>;

export type SensorValue = string | number | boolean;

export type SensorAttributes = Record<string, unknown>;

/**
 * Reported by a sensor whose update source has not produced a snapshot yet.
 */
export const UNKNOWN: unique symbol = Symbol('unknown');

export type Unknown = typeof UNKNOWN;

export function isSection(value: unknown): value is Snapshot {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readValue(snapshot: Snapshot, key: string): SensorValue | null {
  const value = snapshot[key];

  if (value === undefined) {
    throw new MissingFieldError(key);
  }

  if (value === null) {
    return null;
  }

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    default:
      throw new UnexpectedFieldTypeError(key, 'a scalar', value);
  }
}

export function readSection(snapshot: Snapshot, key: string): Snapshot {
  const section = snapshot[key];

  if (section === undefined) {
    throw new MissingFieldError(key);
  }

  if (!isSection(section)) {
    throw new UnexpectedFieldTypeError(key, 'an object', section);
  }

  return section;
}

/**
 * Flags arrive as the strings "true" and "false". Only the exact string
 * "true" is set; every other value reads as false.
 */
export function readFlag(snapshot: Snapshot, section: string, key: string): boolean {
  const flags = readSection(snapshot, section);
  const value = flags[key];

  if (value === undefined) {
    throw new MissingFieldError(`${section}.${key}`);
  }

  return value === 'true';
}
