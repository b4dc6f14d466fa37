import { debugLog } from '../server/runtime.js';
import type { AvwxClient, ReportKind } from './avwx-client.js';
import type { Fragment } from './colorize.js';
import type { WxConfig } from './config.js';
import { colorizeMetar, decodeMetar, type MetarReport } from './metar.js';
import { describePosition, formatCoordinates, type CoordinatePosition, type Position } from './position.js';
import { colorizeTaf, decodeTaf, type TafReport } from './taf.js';

/** Raised whenever no usable report can be produced. */
export class ReportUnavailableError extends Error {
  constructor(message: string = 'No usable report.', options?: ErrorOptions) {
    super(message, options);
    this.name = 'ReportUnavailableError';
  }
}

export type DecodedReport = { kind: 'metar'; report: MetarReport } | { kind: 'taf'; report: TafReport };

interface ResolvedLocation {
  text: string;
  coordinates: CoordinatePosition | null;
}

interface FallbackDependencies {
  client: AvwxClient;
  locateByIp: () => Promise<CoordinatePosition | null>;
}

const resolveLocation = async (position: Position, locateByIp: FallbackDependencies['locateByIp']): Promise<ResolvedLocation> => {
  switch (position.kind) {
    case 'airfield':
      return { text: position.icao, coordinates: null };
    case 'coordinates':
      return { text: formatCoordinates(position), coordinates: position };
    case 'geoip': {
      const located = await locateByIp();
      if (!located) {
        throw new ReportUnavailableError('Could not get location based on IP. Try supplying a position instead or check your internet connection.');
      }
      return { text: formatCoordinates(located), coordinates: located };
    }
  }
};

/**
 * Fetches the report for a position. Only when the provider has nothing for
 * that location is the nearest reporting station looked up and asked once
 * more.
 */
export const fetchReportWithFallback = async (
  { client, locateByIp }: FallbackDependencies,
  kind: ReportKind,
  position: Position,
): Promise<unknown> => {
  try {
    const location = await resolveLocation(position, locateByIp);
    const first = await client.fetchReport(kind, location.text);
    if (first.ok) {
      return first.payload;
    }

    console.log(`[report] No ${kind.toUpperCase()} for ${location.text} (status ${first.status}), trying nearest station...`);
    const origin =
      location.coordinates ?? (position.kind === 'airfield' ? await client.fetchStationCoordinates(position.icao) : null);
    const nearest = origin ? await client.findNearestStation(origin) : null;
    if (!nearest) {
      throw new ReportUnavailableError(`No nearest station for ${describePosition(position)}.`);
    }

    debugLog(`[report] Nearest station to ${location.text} is ${nearest}`);
    const second = await client.fetchReport(kind, nearest);
    if (!second.ok) {
      throw new ReportUnavailableError(`Weather request for ${nearest} failed with status ${second.status}.`);
    }
    return second.payload;
  } catch (error) {
    if (error instanceof ReportUnavailableError) {
      throw error;
    }
    throw new ReportUnavailableError('Weather request failed.', { cause: error });
  }
};

export const decodeReport = (kind: ReportKind, payload: unknown, position: Position): DecodedReport => {
  if (kind === 'metar') {
    const report = decodeMetar(payload, position);
    if (report) {
      return { kind, report };
    }
  } else {
    const report = decodeTaf(payload, position);
    if (report) {
      return { kind, report };
    }
  }
  throw new ReportUnavailableError('Invalid weather data received.');
};

export const colorizeReport = (decoded: DecodedReport, config: Readonly<WxConfig>, nowMs: number = Date.now()): Fragment =>
  decoded.kind === 'metar' ? colorizeMetar(decoded.report, config, nowMs) : colorizeTaf(decoded.report, config, nowMs);

export interface ReportService {
  getReport: (kind: ReportKind, position: Position) => Promise<DecodedReport>;
}

export const createReportService = (dependencies: FallbackDependencies): ReportService => ({
  getReport: async (kind, position) => {
    const payload = await fetchReportWithFallback(dependencies, kind, position);
    return decodeReport(kind, payload, position);
  },
});
