import type { CandidateRow } from './types.js';

/**
 * Escalation Gate
 *
 * Decides which rule rows go to the secondary extractor. Analytic prose
 * ("held that", "in our view") never does; otherwise a row is escalated when
 * its confidence is under the threshold or it has a date without an event
 * (or the reverse).
 */

const ANALYSIS_CUES: readonly RegExp[] = [
  'it is observed',
  'it may be mentioned',
  'question whether',
  'we are unable to',
  'held that',
  'in our view',
  'it is obvious',
  'therefore',
  'consequently',
  'accordingly',
  'it follows that',
].map((cue) => new RegExp(`\\b${cue.replace(/ /g, '\\s+')}\\b`, 'i'));

export function looksLikeAnalysis(text: string): boolean {
  return ANALYSIS_CUES.some((cue) => cue.test(text));
}

export function shouldEscalate(
  row: Pick<CandidateRow, 'description' | 'confidence' | 'hasDate' | 'hasEvent'>,
  threshold: number
): boolean {
  if (looksLikeAnalysis(row.description)) {
    return false;
  }
  if (row.confidence < threshold) {
    return true;
  }
  return row.hasDate !== row.hasEvent;
}

/**
 * Rows that need the secondary extractor. Every rule row still takes part in
 * the merge; escalation only adds candidates.
 */
export function selectForEscalation(rows: readonly CandidateRow[], threshold: number): CandidateRow[] {
  return rows.filter((row) => shouldEscalate(row, threshold));
}
