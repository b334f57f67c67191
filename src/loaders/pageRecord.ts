import type { PageRecord } from '../core/types.js';

/**
 * Trimmed, non-empty lines of a block of text
 */
export function toLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function createPageRecord(page: number, lines: string[], scanned: boolean = false): PageRecord {
  return Object.freeze({
    page,
    text: lines.join('\n'),
    lines: Object.freeze([...lines]),
    scanned,
  });
}
