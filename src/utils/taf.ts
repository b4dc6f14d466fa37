import {
  colorizeFields,
  colorizeStation,
  colorizeTimestamp,
  joinFragments,
  type Fragment,
  type Segment,
} from './colorize.js';
import type { WxConfig } from './config.js';
import { extractFields, type WxField } from './fields.js';
import type { Position } from './position.js';
import { isExactMatch } from './station-match.js';
import { formatDayHour, formatDayHourMinute, parseIsoTimeToMs } from './time.js';
import { defineTokenEnum } from './token-enum.js';
import { resolveUnits, type Units } from './units.js';
import { asArray, asInteger, asNonEmptyString, getPath } from './value-tree.js';

export const CHANGE_KINDS = ['from', 'becoming', 'temporary', 'probability'] as const;

export type ChangeKind = (typeof CHANGE_KINDS)[number];

export const changeIndicator = defineTokenEnum<ChangeKind>(CHANGE_KINDS, {
  from: 'FM',
  becoming: 'BECMG',
  temporary: 'TEMPO',
  probability: 'PROB',
});

interface ForecastPeriodBase {
  startMs: number | null;
  endMs: number | null;
  fields: WxField[];
}

export type ForecastPeriod = ForecastPeriodBase &
  (
    | { kind: 'initial' }
    | { kind: 'from' }
    | { kind: 'becoming' }
    | { kind: 'temporary' }
    /** `null` when the group carries no usable percentage. */
    | { kind: 'probability'; probability: number | null }
  );

export interface TafReport {
  station: string;
  exactMatch: boolean;
  units: Units;
  issueTimeMs: number;
  validFromMs: number;
  validToMs: number;
  /** The first entry is always the `initial` period. */
  periods: ForecastPeriod[];
}

const timeAt = (tree: unknown, key: string): number | null => {
  const raw = getPath(tree, key, 'dt');
  return typeof raw === 'string' ? parseIsoTimeToMs(raw) : null;
};

// The provider spells out FM groups as FROM.
const CHANGE_TYPE_ALIASES: Record<string, string> = { FROM: 'FM' };

const decodeChangeType = (raw: unknown): ChangeKind | null => {
  const text = asNonEmptyString(raw)?.trim().toUpperCase();
  if (!text) {
    return null;
  }
  return changeIndicator.fromString(CHANGE_TYPE_ALIASES[text] ?? text);
};

const decodeChangeGroup = (group: unknown, units: Units): ForecastPeriod | null => {
  const kind = decodeChangeType(getPath(group, 'type'));
  if (kind === null) {
    return null;
  }
  const base: ForecastPeriodBase = {
    startMs: timeAt(group, 'start_time'),
    endMs: timeAt(group, 'end_time'),
    fields: extractFields(group, units),
  };
  if (kind !== 'probability') {
    return { ...base, kind };
  }
  const percentage = asInteger(getPath(group, 'probability', 'value'));
  const probability = percentage !== null && percentage >= 0 && percentage <= 100 ? percentage : null;
  return { ...base, kind, probability };
};

/**
 * The first forecast entry holds the initial conditions whatever its `type`;
 * later entries are change groups, kept in source order. Groups of an
 * unknown type are skipped.
 */
export const decodeForecastPeriods = (tree: unknown, units: Units): ForecastPeriod[] => {
  const [initial, ...changeGroups] = asArray(getPath(tree, 'forecast'));
  if (initial === undefined) {
    return [];
  }
  const periods: ForecastPeriod[] = [
    {
      kind: 'initial',
      startMs: timeAt(initial, 'start_time'),
      endMs: timeAt(initial, 'end_time'),
      fields: extractFields(initial, units),
    },
  ];
  for (const group of changeGroups) {
    const period = decodeChangeGroup(group, units);
    if (period) {
      periods.push(period);
    }
  }
  return periods;
};

/** `null` when the station, issue time or validity window is missing. */
export const decodeTaf = (tree: unknown, position: Position): TafReport | null => {
  const station = asNonEmptyString(getPath(tree, 'station'));
  const issueTimeMs = timeAt(tree, 'time');
  const validFromMs = timeAt(tree, 'start_time');
  const validToMs = timeAt(tree, 'end_time');
  if (!station || issueTimeMs === null || validFromMs === null || validToMs === null) {
    return null;
  }
  const units = resolveUnits(tree);
  return {
    station,
    exactMatch: isExactMatch(station, position),
    units,
    issueTimeMs,
    validFromMs,
    validToMs,
    periods: decodeForecastPeriods(tree, units),
  };
};

const formatWindow = (startMs: number | null, endMs: number | null): string =>
  startMs !== null && endMs !== null ? ` ${formatDayHour(startMs)}/${formatDayHour(endMs)}` : '';

export const formatChangeIndicator = (period: ForecastPeriod): Segment | null => {
  switch (period.kind) {
    case 'initial':
      return null;
    case 'from':
      return period.startMs === null
        ? null
        : { text: `${changeIndicator.toCanonical('from')}${formatDayHourMinute(period.startMs)}`, color: 'yellowBright' };
    case 'becoming':
      return { text: `${changeIndicator.toCanonical('becoming')}${formatWindow(period.startMs, period.endMs)}`, color: 'magentaBright' };
    case 'temporary':
      return { text: `${changeIndicator.toCanonical('temporary')}${formatWindow(period.startMs, period.endMs)}`, color: 'blueBright' };
    case 'probability':
      return {
        text: `${changeIndicator.toCanonical('probability')}${period.probability ?? ''}${formatWindow(period.startMs, period.endMs)}`,
        color: 'redBright',
      };
  }
};

const CHANGE_GROUP_PREFIX = '\n     ';

export const colorizeTaf = (report: TafReport, config: Readonly<WxConfig>, nowMs: number = Date.now()): Fragment => {
  const options = {
    thresholds: config,
    nowMs,
    ageMaximumMs: config.tafAgeMaximumMs,
    ageMarginalMs: config.tafAgeMarginalMs,
  };
  const [initial, ...changeGroups] = report.periods;

  const fragment = joinFragments([
    [{ text: 'TAF', color: 'whiteBright' }],
    colorizeStation(report.station, report.exactMatch),
    colorizeTimestamp(report.issueTimeMs, nowMs, config.tafAgeMaximumMs, config.tafAgeMarginalMs),
    [{ text: `${formatDayHour(report.validFromMs)}/${formatDayHour(report.validToMs)}`, color: 'cyanBright' }],
    initial ? colorizeFields(initial.fields, options) : [],
  ]);

  for (const period of changeGroups) {
    const indicator = config.showChangeTimes ? formatChangeIndicator(period) : null;
    fragment.push(
      { text: CHANGE_GROUP_PREFIX },
      ...joinFragments([indicator ? [indicator] : [], colorizeFields(period.fields, options)]),
    );
  }
  return fragment;
};
