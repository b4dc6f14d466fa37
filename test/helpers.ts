import { readFileSync } from 'node:fs';
import type { ReportFetchResult, ReportKind } from '../src/utils/avwx-client.js';
import { coordinates, type CoordinatePosition } from '../src/utils/position.js';

export const loadFixture = (name: string): unknown =>
  JSON.parse(readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8'));

export const found = (payload: unknown): ReportFetchResult => ({ ok: true, payload });

export const notFound: ReportFetchResult = { ok: false, status: 404 };

/** Provider stand-in: every report request answers with `payload`, the nearest station is EDDF. */
export const createFakeClient = (payload: unknown) => ({
  fetchReport: vi.fn(async (_kind: ReportKind, _location: string): Promise<ReportFetchResult> => found(payload)),
  fetchStationCoordinates: vi.fn(async (_icao: string): Promise<CoordinatePosition | null> => coordinates(49.95, 7.26)),
  findNearestStation: vi.fn(async (_position: CoordinatePosition): Promise<string | null> => 'EDDF'),
  checkStationCode: vi.fn(async (_icao: string) => true),
});

export const noGeoIp = async (): Promise<CoordinatePosition | null> => null;
