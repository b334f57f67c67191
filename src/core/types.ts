import type { EventLabel } from './events.js';

// ============================================================================
// Documents
// ============================================================================

/**
 * One page of a loaded document. Lines are trimmed and non-empty.
 */
export interface PageRecord {
  readonly page: number;
  readonly text: string;
  readonly lines: readonly string[];
  readonly scanned: boolean;
}

/**
 * A heading-delimited region of a page, starting at `start` (line index)
 */
export interface Section {
  readonly label: string;
  readonly start: number;
}

// ============================================================================
// Rows
// ============================================================================

/**
 * Row produced by the rule matcher for a single unit
 */
export interface CandidateRow {
  date: string;
  event: EventLabel;
  description: string;
  location: string;
  source: string;
  confidence: number;
  hasDate: boolean;
  hasEvent: boolean;
}

/**
 * Row returned by the secondary extractor after repair
 */
export interface SecondaryRow {
  date: string;
  event: EventLabel;
  description: string;
  location: string;
  source: string;
}

/**
 * Reconciled row. Confidence is only used for merge tie-breaks.
 */
export interface MergedRow {
  source: string;
  date: string;
  event: EventLabel;
  description: string;
  location: string;
  confidence: number;
}

/**
 * Emitted timeline row, keyed by output column
 */
export interface TimelineRow {
  DATE: string;
  EVENT: EventLabel;
  DESCRIPTION: string;
  'PAGE/SECTION': string;
  SOURCE: string;
}

export const TIMELINE_COLUMNS = ['DATE', 'EVENT', 'DESCRIPTION', 'PAGE/SECTION', 'SOURCE'] as const;
