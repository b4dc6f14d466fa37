const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export interface TokenEnum<T extends string> {
  readonly values: readonly T[];
  toCanonical: (value: T) => string;
  fromString: (raw: string | null | undefined) => T | null;
  alternation: () => string;
}

/**
 * Declares a closed set of report tokens. The canonical table is the only
 * place a token's text is written down: parsing and the regex alternation
 * used by the grammars are both derived from it.
 */
export const defineTokenEnum = <T extends string>(values: readonly T[], canonical: Record<T, string>): TokenEnum<T> => {
  const lookup = new Map<string, T>(values.map((value) => [canonical[value].toUpperCase(), value]));
  const pattern = values
    .map((value) => canonical[value])
    .filter((text) => text.length > 0)
    .map(escapeRegExp)
    .join('|');

  return {
    values,
    toCanonical: (value) => canonical[value],
    fromString: (raw) => {
      if (typeof raw !== 'string') {
        return null;
      }
      return lookup.get(raw.trim().toUpperCase()) ?? null;
    },
    alternation: () => pattern,
  };
};
