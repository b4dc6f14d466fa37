import { extractCloudLayers, type CloudLayerField } from './clouds.js';
import { parseIsoTimeToMs } from './time.js';
import type { DistanceUnit, PressureUnit, SpeedUnit, TemperatureUnit, Units } from './units.js';
import { asArray, asFiniteNumber, asInteger, getPath } from './value-tree.js';
import { extractWeatherPhenomena, type WeatherPhenomenonField } from './wx-codes.js';

export interface TimeStampField {
  kind: 'timestamp';
  timeMs: number;
}

export interface WindField {
  kind: 'wind';
  direction: number;
  speed: number;
  /** 0 when no gusts were reported. */
  gusts: number;
  unit: SpeedUnit;
}

export interface WindVariabilityField {
  kind: 'wind-variability';
  low: number;
  high: number;
}

export interface VisibilityField {
  kind: 'visibility';
  distance: number;
  unit: DistanceUnit;
}

export interface TemperatureField {
  kind: 'temperature';
  temperature: number;
  dewpoint: number;
  unit: TemperatureUnit;
}

/** hPa as reported, inHg in hundredths (29.92 is stored as 2992). */
export interface AltimeterField {
  kind: 'altimeter';
  value: number;
  unit: PressureUnit;
}

export interface RemarksField {
  kind: 'remarks';
  text: string;
}

export type WxField =
  | TimeStampField
  | WindField
  | WindVariabilityField
  | VisibilityField
  | TemperatureField
  | AltimeterField
  | CloudLayerField
  | WeatherPhenomenonField
  | RemarksField;

const valueAt = (tree: unknown, key: string): unknown => getPath(tree, key, 'value');

export const extractTimestamp = (tree: unknown): TimeStampField | null => {
  const raw = getPath(tree, 'time', 'dt');
  const timeMs = typeof raw === 'string' ? parseIsoTimeToMs(raw) : null;
  return timeMs === null ? null : { kind: 'timestamp', timeMs };
};

export const extractWind = (tree: unknown, units: Units): WindField | null => {
  const direction = asInteger(valueAt(tree, 'wind_direction'));
  const speed = asInteger(valueAt(tree, 'wind_speed'));
  if (direction === null || speed === null) {
    return null;
  }
  const gusts = asInteger(valueAt(tree, 'wind_gust')) ?? 0;
  return { kind: 'wind', direction, speed, gusts, unit: units.windSpeed };
};

export const extractWindVariability = (tree: unknown): WindVariabilityField | null => {
  const entries = asArray(getPath(tree, 'wind_variable_direction'));
  const directions: number[] = [];
  for (const entry of entries) {
    const direction = asInteger(getPath(entry, 'value'));
    if (direction === null) {
      return null;
    }
    directions.push(direction);
  }
  if (directions.length === 0) {
    return null;
  }
  directions.sort((a, b) => a - b);
  return { kind: 'wind-variability', low: directions[0], high: directions[directions.length - 1] };
};

export const extractVisibility = (tree: unknown, units: Units): VisibilityField | null => {
  const distance = asInteger(valueAt(tree, 'visibility'));
  return distance === null ? null : { kind: 'visibility', distance, unit: units.distance };
};

export const extractTemperature = (tree: unknown, units: Units): TemperatureField | null => {
  const temperature = asInteger(valueAt(tree, 'temperature'));
  const dewpoint = asInteger(valueAt(tree, 'dewpoint'));
  if (temperature === null || dewpoint === null) {
    return null;
  }
  return { kind: 'temperature', temperature, dewpoint, unit: units.temperature };
};

export const extractAltimeter = (tree: unknown, units: Units): AltimeterField | null => {
  const raw = asFiniteNumber(valueAt(tree, 'altimeter'));
  if (raw === null) {
    return null;
  }
  // JSON drops the decimals of a reading such as 30.00 inHg, which arrives as 30.
  const isWholeInches = units.pressure === 'inHg' && raw < 100;
  const value = Number.isInteger(raw) && !isWholeInches ? raw : Math.round(raw * 100);
  return { kind: 'altimeter', value, unit: units.pressure };
};

export const extractRemarks = (tree: unknown): RemarksField | null => {
  const text = getPath(tree, 'remarks');
  return typeof text === 'string' && text.length > 0 ? { kind: 'remarks', text } : null;
};

/**
 * Decodes every field present in a report (or forecast change group). Missing
 * or malformed sub-trees are skipped, the rest keeps source order.
 */
export const extractFields = (tree: unknown, units: Units): WxField[] => {
  const candidates: (WxField | null)[] = [
    extractTimestamp(tree),
    extractWind(tree, units),
    extractWindVariability(tree),
    extractVisibility(tree, units),
    extractTemperature(tree, units),
    extractAltimeter(tree, units),
    ...extractWeatherPhenomena(tree),
    ...extractCloudLayers(tree),
    extractRemarks(tree),
  ];
  return candidates.filter((field): field is WxField => field !== null);
};
