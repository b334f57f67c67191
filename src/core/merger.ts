import { isValidIsoDate } from './dates.js';
import { normalizeEventLabel } from './events.js';
import type { CandidateRow, MergedRow, SecondaryRow, TimelineRow } from './types.js';

/**
 * Merger / Deduplicator
 *
 * Reconciles rule rows with secondary extractor rows per document, then
 * dedupes the concatenation of all documents once.
 *
 * Per-document key: (source, date, event, page number)
 * Global key:       (source, date, event, page number, first 100 chars of description)
 */

export const DESCRIPTION_LIMIT = 400;
export const SECONDARY_CONFIDENCE = 0.75;

const CONFIDENCE_MARGIN = 0.05;
// Float slack so 0.75 vs 0.70 counts as a full margin
const MARGIN_EPSILON = 1e-9;
const DEDUPE_PREFIX_LENGTH = 100;
const PAGE_NUMBER = /p\.(\d+)/;
const UNKNOWN_PAGE = -1;

// ============================================================================
// Normalization
// ============================================================================

/**
 * Page number from a "p.<n> / <section>" location, or -1
 */
export function pageNumber(location: string): number {
  const match = PAGE_NUMBER.exec(location);
  return match ? Number.parseInt(match[1], 10) : UNKNOWN_PAGE;
}

/**
 * Trim and collapse whitespace, optionally cap the length
 */
export function cleanText(value: string, limit?: number): string {
  const cleaned = value.trim().replace(/\s+/g, ' ');
  return limit !== undefined && cleaned.length > limit ? cleaned.slice(0, limit) : cleaned;
}

export function normalizeRuleRow(row: CandidateRow): MergedRow {
  return {
    source: cleanText(row.source),
    date: cleanText(row.date),
    event: normalizeEventLabel(row.event),
    description: cleanText(row.description, DESCRIPTION_LIMIT),
    location: cleanText(row.location),
    confidence: row.confidence,
  };
}

export function normalizeSecondaryRow(row: SecondaryRow): MergedRow {
  return {
    source: cleanText(row.source),
    date: cleanText(row.date),
    event: normalizeEventLabel(row.event),
    description: cleanText(row.description, DESCRIPTION_LIMIT),
    location: cleanText(row.location),
    confidence: SECONDARY_CONFIDENCE,
  };
}

// ============================================================================
// Merge
// ============================================================================

function mergeKey(row: MergedRow): string {
  return JSON.stringify([row.source, row.date, row.event, pageNumber(row.location)]);
}

/**
 * Pick between the row holding a key and an incoming one: a clearly higher
 * confidence wins, otherwise the longer description, otherwise the holder.
 */
export function preferRow(current: MergedRow, incoming: MergedRow): MergedRow {
  if (Math.abs(current.confidence - incoming.confidence) >= CONFIDENCE_MARGIN - MARGIN_EPSILON) {
    return current.confidence > incoming.confidence ? current : incoming;
  }
  return current.description.length >= incoming.description.length ? current : incoming;
}

/**
 * Merge one document's rule rows and secondary rows, dropping rows whose
 * date is not a real calendar date
 */
export function mergeDocumentRows(
  ruleRows: readonly CandidateRow[],
  secondaryRows: readonly SecondaryRow[]
): MergedRow[] {
  const slots = new Map<string, MergedRow>();

  const fold = (row: MergedRow) => {
    const key = mergeKey(row);
    const current = slots.get(key);
    slots.set(key, current ? preferRow(current, row) : row);
  };

  ruleRows.map(normalizeRuleRow).forEach(fold);
  secondaryRows.map(normalizeSecondaryRow).forEach(fold);

  return Array.from(slots.values()).filter((row) => isValidIsoDate(row.date));
}

// ============================================================================
// Global dedupe
// ============================================================================

type DedupeFields = Pick<MergedRow, 'source' | 'date' | 'event' | 'location' | 'description'>;

/**
 * Keep the first row for each (source, date, event, page, description prefix)
 */
export function dedupeRows<T extends DedupeFields>(rows: readonly T[]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];

  for (const row of rows) {
    const key = JSON.stringify([
      row.source,
      row.date,
      normalizeEventLabel(row.event),
      pageNumber(row.location),
      row.description.slice(0, DEDUPE_PREFIX_LENGTH),
    ]);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    out.push(row);
  }

  return out;
}

/**
 * Drop the internal confidence and key by output column
 */
export function toTimelineRow(row: MergedRow): TimelineRow {
  return {
    DATE: row.date,
    EVENT: row.event,
    DESCRIPTION: row.description,
    'PAGE/SECTION': row.location,
    SOURCE: row.source,
  };
}
