import { debugLog } from '../server/runtime.js';
import type { FetchWithTimeout } from './http-client.js';
import { coordinates, type CoordinatePosition } from './position.js';
import { asArray, asFiniteNumber, asNonEmptyString, getPath, isValueTree } from './value-tree.js';

export type ReportKind = 'metar' | 'taf';

export type ReportFetchResult = { ok: true; payload: unknown } | { ok: false; status: number };

export interface AvwxClient {
  fetchReport: (kind: ReportKind, location: string) => Promise<ReportFetchResult>;
  fetchStationCoordinates: (icao: string) => Promise<CoordinatePosition | null>;
  findNearestStation: (position: CoordinatePosition) => Promise<string | null>;
  checkStationCode: (icao: string) => Promise<boolean>;
}

interface CreateAvwxClientOptions {
  apiKey: string;
  baseUrl: string;
  fetchWithTimeout: FetchWithTimeout;
}

export const createAvwxClient = ({ apiKey, baseUrl, fetchWithTimeout }: CreateAvwxClientOptions): AvwxClient => {
  const fetchOptions: RequestInit = {
    headers: { Authorization: `BEARER ${apiKey}` },
  };

  const get = async (resource: string): Promise<Response> => {
    const url = `${baseUrl}/${resource}`;
    debugLog('[avwx] GET', url);
    const response = await fetchWithTimeout(url, fetchOptions);
    debugLog('[avwx]', response.status, url);
    return response;
  };

  const getJson = async (resource: string): Promise<unknown> => {
    try {
      const response = await get(resource);
      return await response.json();
    } catch (error) {
      console.warn(`[avwx] ${resource} failed:`, error instanceof Error ? error.message : error);
      return null;
    }
  };

  return {
    fetchReport: async (kind, location) => {
      const response = await get(`${kind}/${encodeURI(location)}?onfail=nearest&options=info`);
      if (!response.ok) {
        return { ok: false, status: response.status };
      }
      return { ok: true, payload: await response.json() };
    },

    fetchStationCoordinates: async (icao) => {
      const body = await getJson(`station/${encodeURIComponent(icao)}?filter=latitude,longitude`);
      const lat = asFiniteNumber(getPath(body, 'latitude'));
      const lon = asFiniteNumber(getPath(body, 'longitude'));
      return lat === null || lon === null ? null : coordinates(lat, lon);
    },

    findNearestStation: async ({ lat, lon }) => {
      const body = await getJson(`station/near/${lat},${lon}?n=1&reporting=true`);
      const [first] = asArray(body);
      return asNonEmptyString(getPath(first, 'station', 'icao'));
    },

    checkStationCode: async (icao) => {
      const body = await getJson(`station/${encodeURIComponent(icao)}`);
      return isValueTree(body) && !('error' in body);
    },
  };
};
