/**
 * Regex helpers shared by the clinical extractors.
 */

import type { SourceRef } from '../types/clinical.types';

export const DATE_PATTERN = /\d{1,2}[/-]\d{1,2}[/-]\d{2,4}/;

/**
 * Every match of `pattern` (forced global) in `text`.
 */
export function matchAll(text: string, pattern: RegExp): RegExpExecArray[] {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  const regex = new RegExp(pattern.source, flags);
  const matches: RegExpExecArray[] = [];

  let match = regex.exec(text);
  while (match !== null) {
    matches.push(match);
    if (match[0].length === 0) {
      regex.lastIndex++;
    }
    match = regex.exec(text);
  }

  return matches;
}

export function sourceOf(match: RegExpExecArray): SourceRef {
  return {
    offset: [match.index, match.index + match[0].length],
    context: match[0],
  };
}

export function findDate(text: string): string | null {
  const match = DATE_PATTERN.exec(text);
  return match ? match[0] : null;
}

export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/\b([a-z])/g, (letter) => letter.toUpperCase());
}
