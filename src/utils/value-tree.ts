// Narrowing helpers for the provider's JSON payloads.

export type ValueTree = { [key: string]: unknown };

export const isValueTree = (value: unknown): value is ValueTree =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const getPath = (tree: unknown, ...keys: string[]): unknown => {
  let current: unknown = tree;
  for (const key of keys) {
    if (!isValueTree(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
};

export const asInteger = (value: unknown): number | null =>
  typeof value === 'number' && Number.isInteger(value) ? value : null;

export const asFiniteNumber = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

export const asNonEmptyString = (value: unknown): string | null =>
  typeof value === 'string' && value.trim() ? value : null;

export const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

/** Collects the string `repr` of every entry in a list such as `clouds` or `wx_codes`. */
export const collectReprs = (tree: unknown, key: string): string[] =>
  asArray(getPath(tree, key)).flatMap((entry) => {
    const repr = getPath(entry, 'repr');
    return typeof repr === 'string' ? [repr] : [];
  });
