import { GEOIP, airfield, coordinates, type CoordinatePosition } from '../src/utils/position.js';
import { ReportUnavailableError, createReportService, fetchReportWithFallback } from '../src/utils/report-service.js';
import { found, loadFixture, noGeoIp, notFound, createFakeClient } from './helpers.js';

const edrk = loadFixture('edrk-metar.json');

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

test('a found report is returned without a nearest-station lookup', async () => {
  const client = createFakeClient(edrk);
  const decoded = await createReportService({ client, locateByIp: noGeoIp }).getReport('metar', airfield('EDRK'));
  expect(decoded.kind).toBe('metar');
  expect(decoded.report.station).toBe('EDRK');
  expect(decoded.report.exactMatch).toBe(true);
  expect(client.fetchReport).toHaveBeenCalledTimes(1);
  expect(client.fetchReport).toHaveBeenCalledWith('metar', 'EDRK');
  expect(client.findNearestStation).not.toHaveBeenCalled();
});

test('an airfield without a report falls back to the nearest station once', async () => {
  const client = createFakeClient(edrk);
  client.fetchReport.mockResolvedValueOnce(notFound).mockResolvedValueOnce(found({ station: 'EDDF' }));
  const decoded = await createReportService({ client, locateByIp: noGeoIp }).getReport('metar', airfield('EDRK'));
  expect(decoded.report.station).toBe('EDDF');
  expect(decoded.report.exactMatch).toBe(false);
  expect(client.fetchStationCoordinates).toHaveBeenCalledWith('EDRK');
  expect(client.findNearestStation).toHaveBeenCalledWith(coordinates(49.95, 7.26));
  expect(client.fetchReport.mock.calls).toEqual([
    ['metar', 'EDRK'],
    ['metar', 'EDDF'],
  ]);
});

test('coordinates search from the requested point', async () => {
  const client = createFakeClient(edrk);
  client.fetchReport.mockResolvedValueOnce(notFound);
  await fetchReportWithFallback({ client, locateByIp: noGeoIp }, 'taf', coordinates(50.1, 8.6));
  expect(client.fetchReport.mock.calls[0]).toEqual(['taf', '50.1,8.6']);
  expect(client.fetchStationCoordinates).not.toHaveBeenCalled();
  expect(client.findNearestStation).toHaveBeenCalledWith(coordinates(50.1, 8.6));
});

test('a second miss is not retried', async () => {
  const client = createFakeClient(edrk);
  client.fetchReport.mockResolvedValue(notFound);
  const pending = fetchReportWithFallback({ client, locateByIp: noGeoIp }, 'metar', airfield('EDRK'));
  await expect(pending).rejects.toThrow('Weather request for EDDF failed with status 404.');
  expect(client.fetchReport).toHaveBeenCalledTimes(2);
});

test('no nearest station is a failure', async () => {
  const client = createFakeClient(edrk);
  client.fetchReport.mockResolvedValueOnce(notFound);
  client.findNearestStation.mockResolvedValueOnce(null);
  await expect(fetchReportWithFallback({ client, locateByIp: noGeoIp }, 'metar', airfield('EDRK'))).rejects.toThrow(
    'No nearest station for EDRK.',
  );
  expect(client.fetchReport).toHaveBeenCalledTimes(1);
});

test('geoip positions are located first', async () => {
  const client = createFakeClient(edrk);
  const locateByIp = vi.fn(async (): Promise<CoordinatePosition | null> => coordinates(48.14, 11.58));
  await fetchReportWithFallback({ client, locateByIp }, 'metar', GEOIP);
  expect(locateByIp).toHaveBeenCalledTimes(1);
  expect(client.fetchReport).toHaveBeenCalledWith('metar', '48.14,11.58');
});

test('a failed geoip lookup ends the request', async () => {
  const client = createFakeClient(edrk);
  await expect(fetchReportWithFallback({ client, locateByIp: noGeoIp }, 'metar', GEOIP)).rejects.toBeInstanceOf(
    ReportUnavailableError,
  );
  expect(client.fetchReport).not.toHaveBeenCalled();
});

test('transport errors surface as unavailable reports', async () => {
  const client = createFakeClient(edrk);
  const cause = new Error('socket hang up');
  client.fetchReport.mockRejectedValueOnce(cause);
  const error = await fetchReportWithFallback({ client, locateByIp: noGeoIp }, 'metar', airfield('EDRK')).catch(
    (reason: unknown) => reason,
  );
  expect(error).toBeInstanceOf(ReportUnavailableError);
  if (error instanceof ReportUnavailableError) {
    expect(error.message).toBe('Weather request failed.');
    expect(error.cause).toBe(cause);
  }
});

test('an undecodable payload is unavailable', async () => {
  const client = createFakeClient(edrk);
  client.fetchReport.mockResolvedValueOnce(found({ raw: '' }));
  await expect(createReportService({ client, locateByIp: noGeoIp }).getReport('metar', airfield('EDRK'))).rejects.toThrow(
    'Invalid weather data received.',
  );
});
