import {
  classifyAge,
  classifyCloudHeight,
  classifyVisibility,
  colorizeAltimeter,
  colorizeCloudLayer,
  colorizeField,
  colorizeStation,
  colorizeTemperature,
  colorizeVisibility,
  colorizeWeatherPhenomenon,
  colorizeWind,
  colorizeWindVariability,
  fragmentText,
  joinFragments,
} from '../src/utils/colorize.js';
import { DEFAULT_CONFIG } from '../src/utils/config.js';
import { ansiPainter, paintFragment, plainPainter } from '../src/utils/paint.js';
import { MS_PER_HOUR } from '../src/utils/time.js';
import { parseWeatherPhenomenon } from '../src/utils/wx-codes.js';

const thresholds = DEFAULT_CONFIG;

describe('visibility', () => {
  test('marginal bound is inclusive, minimum bound exclusive', () => {
    expect(classifyVisibility(5000, 'm', thresholds)).toBe('good');
    expect(classifyVisibility(4999, 'm', thresholds)).toBe('marginal');
    expect(classifyVisibility(1501, 'm', thresholds)).toBe('marginal');
    expect(classifyVisibility(1500, 'm', thresholds)).toBe('bad');
  });

  test('thresholds apply in metres whatever the report unit', () => {
    expect(classifyVisibility(3, 'mi', thresholds)).toBe('marginal');
    expect(classifyVisibility(10, 'km', thresholds)).toBe('good');
  });

  test('metres print as four digits, other units with a suffix', () => {
    expect(colorizeVisibility({ kind: 'visibility', distance: 800, unit: 'm' }, thresholds)).toEqual([
      { text: '0800', color: 'red' },
    ]);
    expect(colorizeVisibility({ kind: 'visibility', distance: 10, unit: 'mi' }, thresholds)).toEqual([
      { text: '10SM', color: 'green' },
    ]);
  });
});

describe('clouds', () => {
  test('height bands', () => {
    expect(classifyCloudHeight(6, thresholds)).toBe('bad');
    expect(classifyCloudHeight(15, thresholds)).toBe('marginal');
    expect(classifyCloudHeight(16, thresholds)).toBe('good');
  });

  test('coverage and height are coloured separately', () => {
    expect(colorizeCloudLayer('overcast', 5, thresholds)).toEqual([
      { text: 'OVC', color: 'red' },
      { text: '005', color: 'red' },
    ]);
    expect(colorizeCloudLayer('broken', 25, thresholds)).toEqual([
      { text: 'BRK', color: 'yellow' },
      { text: '025', color: 'green' },
    ]);
  });

  test('a clear sky prints no height', () => {
    expect(colorizeCloudLayer('clear', 0, thresholds)).toEqual([{ text: 'SKC', color: 'green' }]);
  });
});

describe('temperature', () => {
  test('below freezing with a narrow spread', () => {
    const fragment = colorizeTemperature({ kind: 'temperature', temperature: -2, dewpoint: -3, unit: 'C' }, thresholds);
    expect(fragment).toEqual([
      { text: 'M02', color: 'redBright' },
      { text: '/' },
      { text: 'M03', color: 'red' },
    ]);
  });

  test('fahrenheit readings are compared in celsius', () => {
    const fragment = colorizeTemperature({ kind: 'temperature', temperature: 41, dewpoint: 32, unit: 'F' }, thresholds);
    expect(fragment).toEqual([
      { text: '41', color: 'greenBright' },
      { text: '/' },
      { text: '32', color: 'green' },
    ]);
  });
});

describe('wind', () => {
  test('strong gusty wind', () => {
    expect(colorizeWind({ kind: 'wind', direction: 270, speed: 18, gusts: 30, unit: 'kt' }, thresholds)).toEqual([
      { text: '270' },
      { text: '18', color: 'red' },
      { text: 'G' },
      { text: '30', color: 'redBright' },
      { text: 'KT' },
    ]);
  });

  test('speeds in other units are compared in knots', () => {
    const fragment = colorizeWind({ kind: 'wind', direction: 90, speed: 25, gusts: 0, unit: 'kph' }, thresholds);
    expect(fragment).toEqual([{ text: '090' }, { text: '25', color: 'green' }, { text: 'KMH' }]);
  });

  test('a wide variability range is marginal', () => {
    expect(colorizeWindVariability({ kind: 'wind-variability', low: 80, high: 150 }, thresholds)).toEqual([
      { text: '080V150', color: 'yellow' },
    ]);
    expect(colorizeWindVariability({ kind: 'wind-variability', low: 200, high: 240 }, thresholds)).toEqual([
      { text: '200V240', color: 'green' },
    ]);
  });
});

test('altimeter is good at or above standard pressure', () => {
  expect(colorizeAltimeter({ kind: 'altimeter', value: 2992, unit: 'inHg' })).toEqual([{ text: 'A2992', color: 'green' }]);
  expect(colorizeAltimeter({ kind: 'altimeter', value: 1009, unit: 'hPa' })).toEqual([{ text: 'Q1009', color: 'yellow' }]);
});

test('report age bands', () => {
  const now = Date.UTC(2024, 5, 21, 12, 0);
  const max = 6 * MS_PER_HOUR;
  const marginal = MS_PER_HOUR;
  expect(classifyAge(now - 30 * 60 * 1000, now, max, marginal)).toBe('good');
  expect(classifyAge(now - 2 * MS_PER_HOUR, now, max, marginal)).toBe('marginal');
  expect(classifyAge(now - 6 * MS_PER_HOUR, now, max, marginal)).toBe('bad');
});

test('timestamp field uses the age override when given', () => {
  const now = Date.UTC(2024, 5, 21, 12, 0);
  const field = { kind: 'timestamp' as const, timeMs: now - 2 * MS_PER_HOUR };
  expect(colorizeField(field, { thresholds, nowMs: now })).toEqual([{ text: '211000Z', color: 'yellow' }]);
  expect(colorizeField(field, { thresholds, nowMs: now, ageMaximumMs: 12 * MS_PER_HOUR, ageMarginalMs: 6 * MS_PER_HOUR })).toEqual([
    { text: '211000Z', color: 'green' },
  ]);
});

test('weather phenomenon segments drop empty parts', () => {
  const phenomenon = parseWeatherPhenomenon('+TSRA');
  expect(phenomenon).not.toBeNull();
  if (phenomenon) {
    expect(colorizeWeatherPhenomenon(phenomenon)).toEqual([
      { text: '+', color: 'redBright' },
      { text: 'TS', color: 'red' },
      { text: 'RA', color: 'yellowBright' },
    ]);
  }
});

test('remarks render black on white', () => {
  expect(colorizeField({ kind: 'remarks', text: 'NOSIG' }, { thresholds, nowMs: 0 })).toEqual([
    { text: 'NOSIG', color: 'black', background: 'bgWhite' },
  ]);
});

test('station badge marks substitute stations', () => {
  expect(colorizeStation('EDRK', true)).toEqual([{ text: 'EDRK', color: 'whiteBright', background: 'bgBlue' }]);
  expect(colorizeStation('EDDF', false)).toEqual([{ text: 'EDDF', color: 'black', background: 'bgYellow' }]);
});

test('joinFragments separates non-empty parts', () => {
  const joined = joinFragments([[{ text: 'A' }], [], [{ text: 'B', color: 'red' }]]);
  expect(joined).toEqual([{ text: 'A' }, { text: ' ' }, { text: 'B', color: 'red' }]);
  expect(fragmentText(joined)).toBe('A B');
});

test('painters', () => {
  const fragment = [{ text: 'OVC', color: 'red' as const }, { text: '005' }];
  expect(paintFragment(fragment, plainPainter)).toBe('OVC005');
  expect(paintFragment(fragment, ansiPainter)).toBe('\u001B[31mOVC\u001B[39m005');
});
