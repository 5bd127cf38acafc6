import type { CharacteristicClass } from './base.js';
import { BarometricPressureTrendCharacteristic } from './barometric-pressure-trend.js';
import { BatteryLevelCharacteristic } from './battery-level.js';
import { BloodPressureMeasurementCharacteristic } from './blood-pressure-measurement.js';
import { BodyCompositionFeatureCharacteristic } from './body-composition-feature.js';
import { BodyCompositionMeasurementCharacteristic } from './body-composition-measurement.js';
import { DeviceNameCharacteristic } from './device-name.js';
import {
  HumidityCharacteristic,
  PressureCharacteristic,
  TemperatureCharacteristic,
} from './environmental.js';
import { GlucoseMeasurementContextCharacteristic } from './glucose-measurement-context.js';
import { GlucoseMeasurementCharacteristic } from './glucose-measurement.js';
import { HeartRateMeasurementCharacteristic } from './heart-rate-measurement.js';
import { TemperatureMeasurementCharacteristic } from './temperature-measurement.js';
import { WeightMeasurementCharacteristic } from './weight-measurement.js';
import { WeightScaleFeatureCharacteristic } from './weight-scale-feature.js';

export {
  BarometricPressureTrendCharacteristic,
  BatteryLevelCharacteristic,
  BloodPressureMeasurementCharacteristic,
  BodyCompositionFeatureCharacteristic,
  BodyCompositionMeasurementCharacteristic,
  DeviceNameCharacteristic,
  GlucoseMeasurementCharacteristic,
  GlucoseMeasurementContextCharacteristic,
  HeartRateMeasurementCharacteristic,
  HumidityCharacteristic,
  PressureCharacteristic,
  TemperatureCharacteristic,
  TemperatureMeasurementCharacteristic,
  WeightMeasurementCharacteristic,
  WeightScaleFeatureCharacteristic,
};

/** Characteristic types shipped with the library, registered on first registry load. */
export const BUILTIN_CHARACTERISTICS: readonly CharacteristicClass[] = [
  DeviceNameCharacteristic,
  GlucoseMeasurementCharacteristic,
  BatteryLevelCharacteristic,
  TemperatureMeasurementCharacteristic,
  GlucoseMeasurementContextCharacteristic,
  BloodPressureMeasurementCharacteristic,
  HeartRateMeasurementCharacteristic,
  PressureCharacteristic,
  TemperatureCharacteristic,
  HumidityCharacteristic,
  BodyCompositionFeatureCharacteristic,
  BodyCompositionMeasurementCharacteristic,
  WeightMeasurementCharacteristic,
  WeightScaleFeatureCharacteristic,
  BarometricPressureTrendCharacteristic,
];
