/**
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { readFlag, readValue } from '../snapshot';
import type { SensorDescription } from './sensor-description';

const SPECIAL_STATE = 'SpecialState';

function powerSensor(
  key: string,
  translationKey: string,
  title: string,
  icon: string,
  field: string
): SensorDescription {
  return {
    key,
    translationKey,
    title,
    icon,
    unit: 'W',
    stateClass: 'measurement',
    deviceClass: 'power',
    valueFn: (snapshot) => readValue(snapshot, field),
  };
}

function stateFlag(
  key: string,
  translationKey: string,
  title: string,
  icon: string
): SensorDescription {
  return {
    key,
    translationKey,
    title,
    icon,
    entityCategory: 'diagnostic',
    valueFn: (snapshot) => readFlag(snapshot, SPECIAL_STATE, key),
  };
}

const sensorTypes: SensorDescription[] = [
  {
    key: 'batterySoC',
    translationKey: 'battery_soc',
    title: 'Battery State of Charge',
    icon: 'mdi:battery',
    unit: '%',
    stateClass: 'measurement',
    deviceClass: 'battery',
    valueFn: (snapshot) => readValue(snapshot, 'batterySoC'),
  },
  {
    key: 'batteryCapacity',
    translationKey: 'battery_capacity',
    title: 'Battery Capacity',
    icon: 'mdi:battery',
    unit: 'Wh',
    stateClass: 'measurement',
    deviceClass: 'energy_storage',
    valueFn: (snapshot) => readValue(snapshot, 'batteryCapacity'),
  },
  powerSensor('batteryPower', 'battery_power', 'Battery Power', 'mdi:battery', 'batteryPower'),
  powerSensor('gridPower', 'grid_power', 'Grid Power', 'mdi:transmission-tower', 'gridPower'),
  powerSensor('usagePower', 'usage_power', 'Usage Power', 'mdi:transmission-tower', 'usagePower'),
  powerSensor('plantPower', 'plant_power', 'Plant Power', 'mdi:solar-power', 'plantPower'),
  powerSensor(
    'storage_dc_power',
    'storageDCPower',
    'Storage DC Power',
    'mdi:solar-power',
    'storageDCPower'
  ),
  powerSensor('mppt1Power', 'mppt1_power', 'MPPT 1 Power', 'mdi:solar-power', 'storageMPPT1Power'),
  powerSensor('mppt2Power', 'mppt2_power', 'MPPT 2 Power', 'mdi:solar-power', 'storageMPPT2Power'),
  stateFlag('deviceInUpdate', 'device_in_update', 'Device in Update', 'mdi:update'),
  stateFlag('dcSwitchOff', 'dc_switch_off', 'DC Switch Off', 'mdi:toggle-switch-off'),
  stateFlag('gridCodeUnknown', 'grid_code_unknown', 'Grid Code Unknown', 'mdi:help'),
  stateFlag('inWinterMode', 'in_winter_mode', 'Winter Mode', 'mdi:snowflake'),
  stateFlag('inBMZEqualization', 'in_bmz_equalization', 'BMZ Equalization', 'mdi:battery-50'),
  stateFlag('inPeakShaving', 'in_peak_shaving', 'Peak Shaving', 'mdi:flash'),
  stateFlag('inOptimizationLimit', 'in_optimization_limit', 'Optimization Limit', 'mdi:tune'),
  stateFlag(
    'inBatteryCalibration',
    'in_battery_calibration',
    'Battery Calibration',
    'mdi:battery-sync'
  ),
  stateFlag('noPowerMeter', 'no_power_meter', 'No Power Meter', 'mdi:diameter-variant'),
  stateFlag('gridError', 'grid_error', 'Grid Error', 'mdi:alert-circle-outline'),
  stateFlag('gridLocked', 'grid_locked', 'Grid Locked', 'mdi:lock'),
  stateFlag('islandActive', 'island_active', 'Island Active', 'mdi:island'),
  stateFlag('serviceMode', 'service_mode', 'Service Mode', 'mdi:toolbox-outline'),
];

export const SENSOR_TYPES: readonly SensorDescription[] = Object.freeze(sensorTypes);

/**
 * The sensor table without the configured exclusions, in declaration order.
 */
export function selectSensorTypes(excluded: readonly string[] = []): SensorDescription[] {
  return SENSOR_TYPES.filter(({ key }) => excluded.indexOf(key) == -1);
}
