import type { HeaderComparison } from './types';

function unique(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Set comparison of expected vs. actual column names. Order and duplicates collapse;
 * output arrays keep first-seen order so reports stay stable.
 * Extra columns alone never invalidate the header.
 */
export function compareHeaders(expected: readonly string[], actual: readonly string[]): HeaderComparison {
  const expectedSet = new Set(expected);
  const actualSet = new Set(actual);

  const matching = unique(expected).filter((h) => actualSet.has(h));
  const missing = unique(expected).filter((h) => !actualSet.has(h));
  const extra = unique(actual).filter((h) => !expectedSet.has(h));

  return { matching, missing, extra, isValid: missing.length === 0 };
}
