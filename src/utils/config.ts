import fs from 'node:fs';
import { GEOIP, airfield, coordinates, describePosition, type Position } from './position.js';
import { MS_PER_HOUR, MS_PER_SECOND } from './time.js';
import { asFiniteNumber, asInteger, asNonEmptyString, getPath, isValueTree } from './value-tree.js';

export interface Thresholds {
  /** Cloud base in hundreds of feet at or below which a layer is bad. */
  cloudMinimum: number;
  cloudMarginal: number;
  /** °C */
  tempMinimum: number;
  spreadMinimum: number;
  /** Degrees of variable wind direction tolerated before it is marginal. */
  windVarMaximum: number;
  /** Knots */
  windMaximum: number;
  gustMaximum: number;
  ageMaximumMs: number;
  ageMarginalMs: number;
  /** Metres */
  visibilityMinimum: number;
  visibilityMarginal: number;
  tafAgeMaximumMs: number;
  tafAgeMarginalMs: number;
}

export interface WxConfig extends Thresholds {
  position: Position;
  /** Print FM/BECMG/TEMPO/PROB indicators in front of forecast change groups. */
  showChangeTimes: boolean;
}

export const DEFAULT_CONFIG: Readonly<WxConfig> = Object.freeze({
  position: GEOIP,
  cloudMinimum: 6,
  cloudMarginal: 15,
  tempMinimum: 0,
  spreadMinimum: 3,
  windVarMaximum: 45,
  windMaximum: 15,
  gustMaximum: 10,
  ageMaximumMs: 6 * MS_PER_HOUR,
  ageMarginalMs: 1 * MS_PER_HOUR,
  visibilityMinimum: 1500,
  visibilityMarginal: 5000,
  tafAgeMaximumMs: 12 * MS_PER_HOUR,
  tafAgeMarginalMs: 6 * MS_PER_HOUR,
  showChangeTimes: true,
});

type IntegerSetting = Exclude<keyof Thresholds, 'ageMaximumMs' | 'ageMarginalMs' | 'tafAgeMaximumMs' | 'tafAgeMarginalMs'>;
type DurationSetting = 'ageMaximumMs' | 'ageMarginalMs' | 'tafAgeMaximumMs' | 'tafAgeMarginalMs';

const INTEGER_SETTINGS: [section: string, key: string, setting: IntegerSetting][] = [
  ['clouds', 'cloud_minimum', 'cloudMinimum'],
  ['clouds', 'cloud_marginal', 'cloudMarginal'],
  ['temperature', 'temp_minimum', 'tempMinimum'],
  ['temperature', 'spread_minimum', 'spreadMinimum'],
  ['wind', 'wind_var_maximum', 'windVarMaximum'],
  ['wind', 'wind_maximum', 'windMaximum'],
  ['wind', 'gust_maximum', 'gustMaximum'],
  ['visibility', 'visibility_minimum', 'visibilityMinimum'],
  ['visibility', 'visibility_marginal', 'visibilityMarginal'],
];

// Ages are configured in seconds.
const DURATION_SETTINGS: [section: string, key: string, setting: DurationSetting][] = [
  ['age', 'age_maximum', 'ageMaximumMs'],
  ['age', 'age_marginal', 'ageMarginalMs'],
  ['taf', 'age_maximum', 'tafAgeMaximumMs'],
  ['taf', 'age_marginal', 'tafAgeMarginalMs'],
];

const parsePositionSection = (contents: unknown): Position | null => {
  let position: Position | null = null;
  const icao = asNonEmptyString(getPath(contents, 'position', 'airfield'));
  if (icao) {
    position = airfield(icao);
  }
  const lat = asFiniteNumber(getPath(contents, 'position', 'lat'));
  const lon = asFiniteNumber(getPath(contents, 'position', 'lon'));
  if (lat !== null && lon !== null) {
    position = coordinates(lat, lon);
  }
  return position;
};

/**
 * Overlays the recognised settings of a parsed config file onto `base`.
 * Keys with the wrong type are ignored.
 */
export const applyConfigFile = (base: Readonly<WxConfig>, contents: unknown): WxConfig => {
  const config: WxConfig = { ...base };
  if (!isValueTree(contents)) {
    return config;
  }

  const position = parsePositionSection(contents);
  if (position) {
    config.position = position;
  }
  for (const [section, key, setting] of INTEGER_SETTINGS) {
    const value = asInteger(getPath(contents, section, key));
    if (value !== null) {
      config[setting] = value;
    }
  }
  for (const [section, key, setting] of DURATION_SETTINGS) {
    const seconds = asInteger(getPath(contents, section, key));
    if (seconds !== null) {
      config[setting] = seconds * MS_PER_SECOND;
    }
  }
  const showChangeTimes = getPath(contents, 'taf', 'show_change_times');
  if (typeof showChangeTimes === 'boolean') {
    config.showChangeTimes = showChangeTimes;
  }
  return config;
};

type ReadTextFile = (filePath: string) => string;

const readUtf8 = (filePath: string): string => fs.readFileSync(filePath, 'utf8');

export const readConfigFile = (filePath: string, readFile: ReadTextFile = readUtf8): WxConfig => {
  let raw: string;
  try {
    raw = readFile(filePath);
  } catch {
    console.log(`[config] Could not open config file at ${filePath}. Proceeding with defaults...`);
    return { ...DEFAULT_CONFIG };
  }

  let contents: unknown;
  try {
    contents = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load config at ${filePath}: ${reason}`);
  }
  return applyConfigFile(DEFAULT_CONFIG, contents);
};

export interface PositionArgs {
  airfield?: string;
  lat?: number;
  lon?: number;
}

/** Command line position wins over the config file: airfield first, then a complete coordinate pair. */
export const applyPositionArgs = (config: WxConfig, args: PositionArgs): WxConfig => {
  if (args.airfield) {
    return { ...config, position: airfield(args.airfield) };
  }
  if (args.lat !== undefined && args.lon !== undefined) {
    return { ...config, position: coordinates(args.lat, args.lon) };
  }
  if (args.lat !== undefined || args.lon !== undefined) {
    console.log(`[config] Please provide both latitude and longitude. Using ${describePosition(config.position)}...`);
  }
  return config;
};

interface ResolveConfigOptions {
  configPath: string;
  args: PositionArgs;
  checkStationCode: (icao: string) => Promise<boolean>;
  readFile?: ReadTextFile;
}

/**
 * Builds the configuration for one invocation: defaults, then the config
 * file, then the command line. An airfield the provider does not know falls
 * back to geoip.
 */
export const resolveConfig = async ({ configPath, args, checkStationCode, readFile }: ResolveConfigOptions): Promise<Readonly<WxConfig>> => {
  let config = applyPositionArgs(readConfigFile(configPath, readFile), args);

  if (config.position.kind === 'airfield' && !(await checkStationCode(config.position.icao))) {
    console.log(`[config] Invalid airfield ${config.position.icao}. Defaulting to geoip...`);
    config = { ...config, position: GEOIP };
  }
  return Object.freeze(config);
};
