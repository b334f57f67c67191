import fs from 'fs/promises';
import path from 'path';
import { pageNumber } from '../core/merger.js';
import { TIMELINE_COLUMNS, type TimelineRow } from '../core/types.js';

/**
 * Timeline Writer
 *
 * Sorts the final rows and writes them as JSON or CSV.
 */

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sort by source, page number, date, event (stable)
 */
export function sortTimeline(rows: readonly TimelineRow[]): TimelineRow[] {
  return [...rows].sort(
    (a, b) =>
      compareText(a.SOURCE, b.SOURCE) ||
      pageNumber(a['PAGE/SECTION']) - pageNumber(b['PAGE/SECTION']) ||
      compareText(a.DATE, b.DATE) ||
      compareText(a.EVENT, b.EVENT)
  );
}

function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(rows: readonly TimelineRow[]): string {
  const lines = [TIMELINE_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(TIMELINE_COLUMNS.map((column) => escapeCsvField(row[column])).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

export function formatJson(rows: readonly TimelineRow[]): string {
  return JSON.stringify(rows, null, 2);
}

/**
 * Write rows to `.json`, or CSV for any other extension
 */
export async function writeTimeline(rows: readonly TimelineRow[], outPath: string): Promise<void> {
  await fs.mkdir(path.dirname(outPath), { recursive: true });

  const content = path.extname(outPath).toLowerCase() === '.json' ? formatJson(rows) : formatCsv(rows);
  await fs.writeFile(outPath, content, 'utf-8');
}
