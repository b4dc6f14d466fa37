import {
  DEFAULT_UNITS,
  distanceToMeters,
  resolveUnits,
  speedToKnots,
  temperatureSpreadToCelsius,
  temperatureToCelsius,
} from '../src/utils/units.js';

test('resolveUnits falls back to metric defaults without a units tree', () => {
  expect(resolveUnits({})).toEqual(DEFAULT_UNITS);
  expect(resolveUnits(null)).toEqual({ pressure: 'hPa', altitude: 'ft', windSpeed: 'kt', temperature: 'C', distance: 'm' });
});

test('resolveUnits reads the provider units and maps statute miles', () => {
  const units = resolveUnits({
    units: { altimeter: 'inHg', altitude: 'ft', temperature: 'F', visibility: 'sm', wind_speed: 'mph' },
  });
  expect(units).toEqual({ pressure: 'inHg', altitude: 'ft', windSpeed: 'mph', temperature: 'F', distance: 'mi' });
});

test('resolveUnits ignores unknown unit names', () => {
  expect(resolveUnits({ units: { visibility: 'furlong', altimeter: 7 } })).toEqual(DEFAULT_UNITS);
});

test('conversions to the threshold units', () => {
  expect(distanceToMeters(3, 'km')).toBe(3000);
  expect(distanceToMeters(10, 'mi')).toBeCloseTo(16093.44);
  expect(distanceToMeters(2, 'nm')).toBe(3704);
  expect(speedToKnots(10, 'kt')).toBe(10);
  expect(speedToKnots(37.04, 'kph')).toBeCloseTo(20);
  expect(temperatureToCelsius(212, 'F')).toBe(100);
  expect(temperatureToCelsius(-4, 'C')).toBe(-4);
  expect(temperatureSpreadToCelsius(9, 'F')).toBe(5);
});
