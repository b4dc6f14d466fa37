import { defineTokenEnum } from './token-enum.js';
import { collectReprs } from './value-tree.js';

/** Sky coverage bands, ordered by increasing obscuration. */
export const CLOUD_COVERAGES = ['clear', 'few', 'scattered', 'broken', 'overcast'] as const;

export type CloudCoverage = (typeof CLOUD_COVERAGES)[number];

export const cloudCoverage = defineTokenEnum<CloudCoverage>(CLOUD_COVERAGES, {
  clear: 'SKC',
  few: 'FEW',
  scattered: 'SCT',
  broken: 'BRK',
  overcast: 'OVC',
});

export interface CloudLayerField {
  kind: 'clouds';
  coverage: CloudCoverage;
  /** Layer base in hundreds of feet. */
  height: number;
}

const CLOUD_LAYER_PATTERN = new RegExp(`^(${cloudCoverage.alternation()})(\\d*)`, 'i');

export const parseCloudLayer = (repr: string): CloudLayerField | null => {
  const match = CLOUD_LAYER_PATTERN.exec(repr.trim());
  if (!match) {
    return null;
  }
  const coverage = cloudCoverage.fromString(match[1]);
  if (coverage === null) {
    return null;
  }
  const height = match[2] ? parseInt(match[2], 10) : 0;
  return { kind: 'clouds', coverage, height };
};

export const extractCloudLayers = (tree: unknown): CloudLayerField[] =>
  collectReprs(tree, 'clouds').flatMap((repr) => {
    const layer = parseCloudLayer(repr);
    return layer ? [layer] : [];
  });
