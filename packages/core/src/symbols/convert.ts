import { SYMBOL_TABLE, type PatternEntry } from './table';

/**
 * Rewrite a fragment of HTML pseudo-math into LaTeX.
 * Each entry is applied to every occurrence before the next entry runs; text no entry
 * recognises is returned as is.
 */
export function convertFragment(
  text: string,
  table: readonly PatternEntry[] = SYMBOL_TABLE
): string {
  let result = text;
  for (const [pattern, template] of table) {
    result = result.replace(pattern, template);
  }
  return result;
}
