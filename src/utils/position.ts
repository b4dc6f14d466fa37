import type { FetchWithTimeout } from './http-client.js';
import { asFiniteNumber, getPath } from './value-tree.js';

export interface AirfieldPosition {
  kind: 'airfield';
  icao: string;
}

export interface CoordinatePosition {
  kind: 'coordinates';
  lat: number;
  lon: number;
}

export interface GeoIpPosition {
  kind: 'geoip';
}

export type Position = AirfieldPosition | CoordinatePosition | GeoIpPosition;

export const airfield = (icao: string): AirfieldPosition => ({ kind: 'airfield', icao: icao.trim().toUpperCase() });

export const coordinates = (lat: number, lon: number): CoordinatePosition => ({ kind: 'coordinates', lat, lon });

export const GEOIP: GeoIpPosition = Object.freeze({ kind: 'geoip' });

export const formatCoordinates = ({ lat, lon }: { lat: number; lon: number }): string => `${lat},${lon}`;

export const describePosition = (position: Position): string => {
  switch (position.kind) {
    case 'airfield':
      return position.icao;
    case 'coordinates':
      return formatCoordinates(position);
    case 'geoip':
      return 'geoip';
  }
};

const GEOIP_URL = 'http://ip-api.com/json/';

interface LookupGeoIpOptions {
  fetchWithTimeout: FetchWithTimeout;
  fetchOptions?: RequestInit;
}

/** Approximate coordinates of this machine's public IP, or `null` when the lookup fails. */
export const lookupGeoIp = async ({ fetchWithTimeout, fetchOptions = {} }: LookupGeoIpOptions): Promise<CoordinatePosition | null> => {
  try {
    const response = await fetchWithTimeout(GEOIP_URL, fetchOptions);
    if (!response.ok) {
      return null;
    }
    const payload: unknown = await response.json();
    if (getPath(payload, 'status') !== 'success') {
      return null;
    }
    const lat = asFiniteNumber(getPath(payload, 'lat'));
    const lon = asFiniteNumber(getPath(payload, 'lon'));
    return lat === null || lon === null ? null : coordinates(lat, lon);
  } catch (error) {
    console.warn('[geoip] lookup failed:', error instanceof Error ? error.message : error);
    return null;
  }
};
