import { colorizeFields, colorizeStation, joinFragments, type Fragment } from './colorize.js';
import type { WxConfig } from './config.js';
import { extractFields, type WxField } from './fields.js';
import type { Position } from './position.js';
import { isExactMatch } from './station-match.js';
import { resolveUnits, type Units } from './units.js';
import { asNonEmptyString, getPath } from './value-tree.js';

export interface MetarReport {
  station: string;
  /** False when the provider answered with a substitute station. */
  exactMatch: boolean;
  units: Units;
  fields: WxField[];
}

/** `null` when the payload has no station identifier; every other field is optional. */
export const decodeMetar = (tree: unknown, position: Position): MetarReport | null => {
  const station = asNonEmptyString(getPath(tree, 'station'));
  if (!station) {
    return null;
  }
  const units = resolveUnits(tree);
  return {
    station,
    exactMatch: isExactMatch(station, position),
    units,
    fields: extractFields(tree, units),
  };
};

export const colorizeMetar = (report: MetarReport, config: Readonly<WxConfig>, nowMs: number = Date.now()): Fragment =>
  joinFragments([
    colorizeStation(report.station, report.exactMatch),
    colorizeFields(report.fields, { thresholds: config, nowMs }),
  ]);
