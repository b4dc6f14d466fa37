import { defineTokenEnum } from './token-enum.js';
import { collectReprs } from './value-tree.js';

export const WX_CODES = [
  'rain',
  'drizzle',
  'hail',
  'small-hail',
  'ice-crystals',
  'ice-pellets',
  'snow-grains',
  'snow',
  'unknown-precipitation',
  'mist',
  'widespread-dust',
  'fog',
  'smoke',
  'haze',
  'spray',
  'sand',
  'volcanic-ash',
  'dust-storm',
  'funnel-cloud',
  'dust-whirls',
  'squalls',
  'sandstorm',
] as const;

export type WxCode = (typeof WX_CODES)[number];

export const wxCode = defineTokenEnum<WxCode>(WX_CODES, {
  rain: 'RA',
  drizzle: 'DZ',
  hail: 'GR',
  'small-hail': 'GS',
  'ice-crystals': 'IC',
  'ice-pellets': 'PL',
  'snow-grains': 'SG',
  snow: 'SN',
  'unknown-precipitation': 'UP',
  mist: 'BR',
  'widespread-dust': 'DU',
  fog: 'FG',
  smoke: 'FU',
  haze: 'HZ',
  spray: 'PY',
  sand: 'SA',
  'volcanic-ash': 'VA',
  'dust-storm': 'DS',
  'funnel-cloud': 'FC',
  'dust-whirls': 'PO',
  squalls: 'SQ',
  sandstorm: 'SS',
});

export const WX_INTENSITIES = ['moderate', 'light', 'heavy'] as const;

export type WxIntensity = (typeof WX_INTENSITIES)[number];

export const wxIntensity = defineTokenEnum<WxIntensity>(WX_INTENSITIES, {
  moderate: '',
  light: '-',
  heavy: '+',
});

export const WX_DESCRIPTORS = [
  'none',
  'thunderstorm',
  'patches',
  'blowing',
  'low-drifting',
  'freezing',
  'shallow',
  'partial',
  'showers',
] as const;

export type WxDescriptor = (typeof WX_DESCRIPTORS)[number];

export const wxDescriptor = defineTokenEnum<WxDescriptor>(WX_DESCRIPTORS, {
  none: '',
  thunderstorm: 'TS',
  patches: 'BC',
  blowing: 'BL',
  'low-drifting': 'DR',
  freezing: 'FZ',
  shallow: 'MI',
  partial: 'PR',
  showers: 'SH',
});

export const WX_PROXIMITIES = ['on-station', 'vicinity', 'distant'] as const;

export type WxProximity = (typeof WX_PROXIMITIES)[number];

export const wxProximity = defineTokenEnum<WxProximity>(WX_PROXIMITIES, {
  'on-station': '',
  vicinity: 'VC',
  distant: 'DSNT',
});

export interface WeatherPhenomenonField {
  kind: 'weather';
  code: WxCode;
  intensity: WxIntensity;
  descriptor: WxDescriptor;
  proximity: WxProximity;
}

const WX_TOKEN_PATTERN = new RegExp(
  `^(${wxIntensity.alternation()})?(${wxDescriptor.alternation()})?(${wxCode.alternation()})(${wxProximity.alternation()})?$`,
  'i',
);

/** Decodes tokens such as `-RA`, `+TSRA` or `FGDSNT`; anything else yields `null`. */
export const parseWeatherPhenomenon = (repr: string): WeatherPhenomenonField | null => {
  const match = WX_TOKEN_PATTERN.exec(repr.trim());
  if (!match) {
    return null;
  }
  const intensity = wxIntensity.fromString(match[1] ?? '');
  const descriptor = wxDescriptor.fromString(match[2] ?? '');
  const code = wxCode.fromString(match[3]);
  const proximity = wxProximity.fromString(match[4] ?? '');
  if (intensity === null || descriptor === null || code === null || proximity === null) {
    return null;
  }
  return { kind: 'weather', code, intensity, descriptor, proximity };
};

export const formatWeatherPhenomenon = ({ intensity, descriptor, code, proximity }: WeatherPhenomenonField): string =>
  `${wxIntensity.toCanonical(intensity)}${wxDescriptor.toCanonical(descriptor)}${wxCode.toCanonical(code)}${wxProximity.toCanonical(proximity)}`;

export const extractWeatherPhenomena = (tree: unknown): WeatherPhenomenonField[] =>
  collectReprs(tree, 'wx_codes').flatMap((repr) => {
    const phenomenon = parseWeatherPhenomenon(repr);
    return phenomenon ? [phenomenon] : [];
  });
