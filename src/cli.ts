import { parseArgs } from 'node:util';
import chalk, { type ChalkInstance } from 'chalk';
import type { Express } from 'express';
import { createWxApp } from './app.js';
import { CONFIG_PATH, PACKAGE_VERSION } from './server/runtime.js';
import type { AvwxClient } from './utils/avwx-client.js';
import { resolveConfig, type PositionArgs } from './utils/config.js';
import { paintFragment } from './utils/paint.js';
import type { CoordinatePosition } from './utils/position.js';
import { colorizeReport, createReportService } from './utils/report-service.js';

export const USAGE = `Usage: wxline [options]

Prints the current METAR (or TAF) for a position, coloured by how flyable it is.

Options:
  -a, --airfield <ICAO>  Airfield to report on
      --lat <deg>        Latitude; pass negative values as --lat=-33.9
      --lon <deg>        Longitude; pass negative values as --lon=-70.6
  -t, --taf              Print the terminal forecast instead of the observation
  -c, --config <file>    Config file (default ${CONFIG_PATH})
      --serve            Serve /api/metar and /api/taf over HTTP instead
  -h, --help             Show this help
  -v, --version          Show the version`;

export interface CliDependencies {
  /** Called once the command line is known to need the provider. */
  createClient: () => AvwxClient;
  locateByIp: () => Promise<CoordinatePosition | null>;
  serve: (app: Express) => void;
  readFile?: (filePath: string) => string;
  painter?: ChalkInstance;
  now?: () => number;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

const parseCoordinateArg = (name: string, raw: string | undefined): number | undefined => {
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`--${name} must be a number, got "${raw}"`);
  }
  return parsed;
};

const parseCliArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    options: {
      airfield: { type: 'string', short: 'a' },
      lat: { type: 'string' },
      lon: { type: 'string' },
      taf: { type: 'boolean', short: 't', default: false },
      config: { type: 'string', short: 'c' },
      serve: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    strict: true,
    allowPositionals: false,
  }).values;

/** Runs one invocation and resolves to the process exit code. */
export const runCli = async (argv: string[], dependencies: CliDependencies): Promise<number> => {
  const {
    createClient,
    locateByIp,
    serve,
    readFile,
    painter = chalk,
    now = Date.now,
    stdout = (text: string) => console.log(text),
    stderr = (text: string) => console.error(text),
  } = dependencies;

  try {
    const values = parseCliArgs(argv);
    if (values.help) {
      stdout(USAGE);
      return 0;
    }
    if (values.version) {
      stdout(PACKAGE_VERSION);
      return 0;
    }

    const args: PositionArgs = {
      airfield: values.airfield,
      lat: parseCoordinateArg('lat', values.lat),
      lon: parseCoordinateArg('lon', values.lon),
    };
    const client = createClient();
    const config = await resolveConfig({
      configPath: values.config ?? CONFIG_PATH,
      args,
      checkStationCode: client.checkStationCode,
      readFile,
    });
    const reportService = createReportService({ client, locateByIp });

    if (values.serve) {
      serve(createWxApp({ reportService, config, now }));
      return 0;
    }

    const decoded = await reportService.getReport(values.taf ? 'taf' : 'metar', config.position);
    stdout(paintFragment(colorizeReport(decoded, config, now()), painter));
    return 0;
  } catch (error) {
    stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
};
