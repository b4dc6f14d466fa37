import { GEOIP, airfield, coordinates, describePosition, lookupGeoIp } from '../src/utils/position.js';

const jsonResponse = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

afterEach(() => {
  vi.restoreAllMocks();
});

test('airfield codes are normalised', () => {
  expect(airfield(' eddf ')).toEqual({ kind: 'airfield', icao: 'EDDF' });
});

test('positions describe themselves as location strings', () => {
  expect(describePosition(airfield('EDDF'))).toBe('EDDF');
  expect(describePosition(coordinates(-33.95, 18.6))).toBe('-33.95,18.6');
  expect(describePosition(GEOIP)).toBe('geoip');
});

test('lookupGeoIp reads the coordinates of a successful lookup', async () => {
  const fetchWithTimeout = vi.fn(async (_url: string, _options?: RequestInit) =>
    jsonResponse({ status: 'success', lat: 52.52, lon: 13.4, city: 'Berlin' }),
  );
  expect(await lookupGeoIp({ fetchWithTimeout })).toEqual(coordinates(52.52, 13.4));
  expect(fetchWithTimeout).toHaveBeenCalledWith('http://ip-api.com/json/', {});
});

test('lookupGeoIp is null when the service reports a failure', async () => {
  const fetchWithTimeout = vi.fn(async (_url: string, _options?: RequestInit) =>
    jsonResponse({ status: 'fail', message: 'private range' }),
  );
  expect(await lookupGeoIp({ fetchWithTimeout })).toBeNull();
});

test('lookupGeoIp is null when the request fails', async () => {
  const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  const fetchWithTimeout = vi.fn(async (_url: string, _options?: RequestInit): Promise<Response> => {
    throw new Error('getaddrinfo ENOTFOUND ip-api.com');
  });
  expect(await lookupGeoIp({ fetchWithTimeout })).toBeNull();
  expect(warnSpy).toHaveBeenCalledWith('[geoip] lookup failed:', 'getaddrinfo ENOTFOUND ip-api.com');
});
