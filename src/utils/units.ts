import { getPath } from './value-tree.js';

export type PressureUnit = 'hPa' | 'inHg';
export type AltitudeUnit = 'ft' | 'm';
export type SpeedUnit = 'kt' | 'kph' | 'mph';
export type TemperatureUnit = 'C' | 'F';
export type DistanceUnit = 'm' | 'nm' | 'mi' | 'km';

export interface Units {
  pressure: PressureUnit;
  altitude: AltitudeUnit;
  windSpeed: SpeedUnit;
  temperature: TemperatureUnit;
  distance: DistanceUnit;
}

export const DEFAULT_UNITS: Readonly<Units> = Object.freeze({
  pressure: 'hPa',
  altitude: 'ft',
  windSpeed: 'kt',
  temperature: 'C',
  distance: 'm',
});

const PRESSURE_UNITS: Record<string, PressureUnit> = { hpa: 'hPa', inhg: 'inHg' };
const ALTITUDE_UNITS: Record<string, AltitudeUnit> = { ft: 'ft', m: 'm' };
const SPEED_UNITS: Record<string, SpeedUnit> = { kt: 'kt', kph: 'kph', mph: 'mph' };
const TEMPERATURE_UNITS: Record<string, TemperatureUnit> = { c: 'C', f: 'F' };
// AVWX reports statute miles as "sm".
const DISTANCE_UNITS: Record<string, DistanceUnit> = { m: 'm', nm: 'nm', mi: 'mi', sm: 'mi', km: 'km' };

const pickUnit = <T extends string>(raw: unknown, table: Record<string, T>, fallback: T): T => {
  if (typeof raw !== 'string') {
    return fallback;
  }
  return table[raw.trim().toLowerCase()] ?? fallback;
};

export const resolveUnits = (tree: unknown): Units => {
  const units = getPath(tree, 'units');
  return {
    pressure: pickUnit(getPath(units, 'altimeter'), PRESSURE_UNITS, DEFAULT_UNITS.pressure),
    altitude: pickUnit(getPath(units, 'altitude'), ALTITUDE_UNITS, DEFAULT_UNITS.altitude),
    windSpeed: pickUnit(getPath(units, 'wind_speed'), SPEED_UNITS, DEFAULT_UNITS.windSpeed),
    temperature: pickUnit(getPath(units, 'temperature'), TEMPERATURE_UNITS, DEFAULT_UNITS.temperature),
    distance: pickUnit(getPath(units, 'visibility'), DISTANCE_UNITS, DEFAULT_UNITS.distance),
  };
};

const METERS_PER_DISTANCE_UNIT: Record<DistanceUnit, number> = {
  m: 1,
  km: 1000,
  mi: 1609.344,
  nm: 1852,
};

const KNOTS_PER_SPEED_UNIT: Record<SpeedUnit, number> = {
  kt: 1,
  kph: 1 / 1.852,
  mph: 0.868976,
};

export const distanceToMeters = (distance: number, unit: DistanceUnit): number => distance * METERS_PER_DISTANCE_UNIT[unit];

export const speedToKnots = (speed: number, unit: SpeedUnit): number => speed * KNOTS_PER_SPEED_UNIT[unit];

export const temperatureToCelsius = (value: number, unit: TemperatureUnit): number =>
  unit === 'F' ? ((value - 32) * 5) / 9 : value;

/** A temperature difference, so no offset is applied. */
export const temperatureSpreadToCelsius = (spread: number, unit: TemperatureUnit): number =>
  unit === 'F' ? (spread * 5) / 9 : spread;
