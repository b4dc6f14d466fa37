import type { BackgroundColorName, ForegroundColorName } from 'chalk';
import { cloudCoverage, type CloudCoverage } from './clouds.js';
import type { Thresholds } from './config.js';
import type {
  AltimeterField,
  TemperatureField,
  VisibilityField,
  WindField,
  WindVariabilityField,
  WxField,
} from './fields.js';
import { formatIssueTime } from './time.js';
import {
  distanceToMeters,
  speedToKnots,
  temperatureSpreadToCelsius,
  temperatureToCelsius,
  type DistanceUnit,
  type PressureUnit,
  type SpeedUnit,
  type TemperatureUnit,
} from './units.js';
import {
  wxCode,
  wxDescriptor,
  wxIntensity,
  wxProximity,
  type WeatherPhenomenonField,
  type WxCode,
  type WxDescriptor,
  type WxIntensity,
} from './wx-codes.js';

export interface Segment {
  text: string;
  color?: ForegroundColorName;
  background?: BackgroundColorName;
}

/** Coloured text, kept as data until a painter turns it into a string. */
export type Fragment = Segment[];

export type Severity = 'good' | 'marginal' | 'bad';

export const SEVERITY_COLORS: Record<Severity, ForegroundColorName> = {
  good: 'green',
  marginal: 'yellow',
  bad: 'red',
};

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

export const joinFragments = (parts: Fragment[], separator: string = ' '): Fragment =>
  parts
    .filter((part) => part.length > 0)
    .flatMap((part, index) => (index === 0 ? part : [{ text: separator }, ...part]));

export const fragmentText = (fragment: Fragment): string => fragment.map(({ text }) => text).join('');

// Visibility

export const classifyVisibility = (distance: number, unit: DistanceUnit, thresholds: Thresholds): Severity => {
  const meters = distanceToMeters(distance, unit);
  if (meters >= thresholds.visibilityMarginal) {
    return 'good';
  }
  if (meters > thresholds.visibilityMinimum) {
    return 'marginal';
  }
  return 'bad';
};

const VISIBILITY_SUFFIXES: Record<Exclude<DistanceUnit, 'm'>, string> = { mi: 'SM', km: 'KM', nm: 'NM' };

export const colorizeVisibility = ({ distance, unit }: VisibilityField, thresholds: Thresholds): Fragment => {
  const text = unit === 'm' ? pad(distance, 4) : `${distance}${VISIBILITY_SUFFIXES[unit]}`;
  return [{ text, color: SEVERITY_COLORS[classifyVisibility(distance, unit, thresholds)] }];
};

// Clouds

export const classifyCloudCoverage = (coverage: CloudCoverage): Severity => {
  switch (coverage) {
    case 'overcast':
      return 'bad';
    case 'broken':
      return 'marginal';
    default:
      return 'good';
  }
};

export const classifyCloudHeight = (height: number, thresholds: Thresholds): Severity => {
  if (height <= thresholds.cloudMinimum) {
    return 'bad';
  }
  if (height <= thresholds.cloudMarginal) {
    return 'marginal';
  }
  return 'good';
};

export const colorizeCloudLayer = (coverage: CloudCoverage, height: number, thresholds: Thresholds): Fragment => {
  const fragment: Fragment = [
    { text: cloudCoverage.toCanonical(coverage), color: SEVERITY_COLORS[classifyCloudCoverage(coverage)] },
  ];
  // A clear sky has no layer base to print.
  if (coverage !== 'clear' || height > 0) {
    fragment.push({ text: pad(height, 3), color: SEVERITY_COLORS[classifyCloudHeight(height, thresholds)] });
  }
  return fragment;
};

// Temperature

export const classifyTemperature = (temperature: number, unit: TemperatureUnit, thresholds: Thresholds): Severity =>
  temperatureToCelsius(temperature, unit) > thresholds.tempMinimum ? 'good' : 'bad';

export const classifyDewpointSpread = (
  temperature: number,
  dewpoint: number,
  unit: TemperatureUnit,
  thresholds: Thresholds,
): Severity => (temperatureSpreadToCelsius(temperature - dewpoint, unit) > thresholds.spreadMinimum ? 'good' : 'bad');

/** Bulletin notation: two digits, `M` for below zero. */
export const formatTemperature = (value: number): string => (value < 0 ? `M${pad(-value, 2)}` : pad(value, 2));

export const colorizeTemperature = ({ temperature, dewpoint, unit }: TemperatureField, thresholds: Thresholds): Fragment => [
  {
    text: formatTemperature(temperature),
    color: classifyTemperature(temperature, unit, thresholds) === 'good' ? 'greenBright' : 'redBright',
  },
  { text: '/' },
  {
    text: formatTemperature(dewpoint),
    color: SEVERITY_COLORS[classifyDewpointSpread(temperature, dewpoint, unit, thresholds)],
  },
];

// Wind

export const classifyWindSpeed = (speed: number, unit: SpeedUnit, thresholds: Thresholds): Severity =>
  speedToKnots(speed, unit) > thresholds.windMaximum ? 'bad' : 'good';

export const classifyGustSpread = (speed: number, gusts: number, unit: SpeedUnit, thresholds: Thresholds): Severity =>
  speedToKnots(gusts - speed, unit) > thresholds.gustMaximum ? 'bad' : 'good';

export const classifyWindVariability = (low: number, high: number, thresholds: Thresholds): Severity =>
  high - low < thresholds.windVarMaximum ? 'good' : 'marginal';

const SPEED_SUFFIXES: Record<SpeedUnit, string> = { kt: 'KT', kph: 'KMH', mph: 'MPH' };

export const colorizeWind = ({ direction, speed, gusts, unit }: WindField, thresholds: Thresholds): Fragment => {
  const fragment: Fragment = [
    { text: pad(direction, 3) },
    { text: pad(speed, 2), color: SEVERITY_COLORS[classifyWindSpeed(speed, unit, thresholds)] },
  ];
  if (gusts > 0) {
    const gustSeverity = classifyGustSpread(speed, gusts, unit, thresholds);
    fragment.push({ text: 'G' }, { text: pad(gusts, 2), color: gustSeverity === 'bad' ? 'redBright' : 'green' });
  }
  fragment.push({ text: SPEED_SUFFIXES[unit] });
  return fragment;
};

export const colorizeWindVariability = ({ low, high }: WindVariabilityField, thresholds: Thresholds): Fragment => [
  { text: `${pad(low, 3)}V${pad(high, 3)}`, color: SEVERITY_COLORS[classifyWindVariability(low, high, thresholds)] },
];

// Altimeter

const STANDARD_PRESSURE: Record<PressureUnit, number> = { hPa: 1013, inHg: 2992 };

export const classifyAltimeter = (value: number, unit: PressureUnit): Severity =>
  value >= STANDARD_PRESSURE[unit] ? 'good' : 'marginal';

export const colorizeAltimeter = ({ value, unit }: AltimeterField): Fragment => [
  { text: `${unit === 'hPa' ? 'Q' : 'A'}${pad(value, 4)}`, color: SEVERITY_COLORS[classifyAltimeter(value, unit)] },
];

// Report age

export const classifyAge = (timeMs: number, nowMs: number, maximumMs: number, marginalMs: number): Severity => {
  const ageMs = nowMs - timeMs;
  if (ageMs < marginalMs) {
    return 'good';
  }
  if (ageMs < maximumMs) {
    return 'marginal';
  }
  return 'bad';
};

export const colorizeTimestamp = (timeMs: number, nowMs: number, maximumMs: number, marginalMs: number): Fragment => [
  { text: formatIssueTime(timeMs), color: SEVERITY_COLORS[classifyAge(timeMs, nowMs, maximumMs, marginalMs)] },
];

// Weather phenomena

const INTENSITY_COLORS: Record<WxIntensity, ForegroundColorName> = {
  light: 'greenBright',
  moderate: 'white',
  heavy: 'redBright',
};

const DESCRIPTOR_COLORS: Partial<Record<WxDescriptor, ForegroundColorName>> = {
  thunderstorm: 'red',
  freezing: 'blueBright',
  showers: 'yellow',
};

const CODE_COLORS: Partial<Record<WxCode, ForegroundColorName>> = {
  rain: 'yellowBright',
  hail: 'red',
  snow: 'red',
  'unknown-precipitation': 'red',
  'small-hail': 'yellow',
  'dust-whirls': 'redBright',
};

export const colorizeWeatherPhenomenon = ({ code, intensity, descriptor, proximity }: WeatherPhenomenonField): Fragment => {
  const segments: Fragment = [
    { text: wxIntensity.toCanonical(intensity), color: INTENSITY_COLORS[intensity] },
    { text: wxDescriptor.toCanonical(descriptor), color: DESCRIPTOR_COLORS[descriptor] ?? 'white' },
    { text: wxCode.toCanonical(code), color: CODE_COLORS[code] ?? 'white' },
    { text: wxProximity.toCanonical(proximity), color: 'white' },
  ];
  return segments.filter(({ text }) => text.length > 0);
};

// Whole fields

export interface ColorizeOptions {
  thresholds: Thresholds;
  /** Sampled once per render pass. */
  nowMs: number;
  ageMaximumMs?: number;
  ageMarginalMs?: number;
}

export const colorizeField = (field: WxField, { thresholds, nowMs, ageMaximumMs, ageMarginalMs }: ColorizeOptions): Fragment => {
  switch (field.kind) {
    case 'timestamp':
      return colorizeTimestamp(
        field.timeMs,
        nowMs,
        ageMaximumMs ?? thresholds.ageMaximumMs,
        ageMarginalMs ?? thresholds.ageMarginalMs,
      );
    case 'wind':
      return colorizeWind(field, thresholds);
    case 'wind-variability':
      return colorizeWindVariability(field, thresholds);
    case 'visibility':
      return colorizeVisibility(field, thresholds);
    case 'temperature':
      return colorizeTemperature(field, thresholds);
    case 'altimeter':
      return colorizeAltimeter(field);
    case 'clouds':
      return colorizeCloudLayer(field.coverage, field.height, thresholds);
    case 'weather':
      return colorizeWeatherPhenomenon(field);
    case 'remarks':
      return [{ text: field.text, color: 'black', background: 'bgWhite' }];
  }
};

export const colorizeFields = (fields: WxField[], options: ColorizeOptions): Fragment =>
  joinFragments(fields.map((field) => colorizeField(field, options)));

export const colorizeStation = (station: string, exactMatch: boolean): Fragment => [
  exactMatch
    ? { text: station, color: 'whiteBright', background: 'bgBlue' }
    : { text: station, color: 'black', background: 'bgYellow' },
];
