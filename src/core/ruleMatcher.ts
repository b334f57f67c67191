import type { CompiledRules, EventRule } from '../config/rules.js';
import { parseDate } from './dates.js';
import { GENERIC_EVENT, type EventLabel } from './events.js';
import { buildSections, sectionForIndex } from './sectionChunker.js';
import type { CandidateRow, PageRecord } from './types.js';

/**
 * Rule Matcher
 *
 * Evaluates each unit of a page on its own: finds dates, assigns an event
 * label from the configured patterns, and scores how much the row can be
 * trusted. Units with neither a date nor an event produce nothing.
 */

// Statutory citations ("Section 5 of the ... Act") are context, not court steps
const STATUTE_CUES = /\b(?:acts?|amendments?|sections?|sub-sections?|clauses?|with effect from)\b/;
const PROCEDURAL_CUES = /\b(?:hearing|order|decree|judgment)/;
const PROCEEDINGS_SECTION = /proceeding|hearing/i;

const EVENT_WEIGHT = 0.5;
const DATE_WEIGHT = 0.2;
const SECTION_WEIGHT = 0.2;
const AMBIGUITY_PENALTY = 0.1;

function escapeForCharClass(value: string): string {
  return value.replace(/[\\\]\[^-]/g, '\\$&');
}

/**
 * Split a line into units: the line itself, or its delimiter-bounded fragments
 */
export function splitUnits(line: string, rules: Pick<CompiledRules, 'lineBreakIsBoundary' | 'delimiters'>): string[] {
  const parts = rules.lineBreakIsBoundary
    ? [line]
    : line.split(new RegExp(`[${rules.delimiters.map(escapeForCharClass).join('')}]`));

  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Distinct ISO dates found in a unit, ascending
 */
export function findDates(unit: string, rules: Pick<CompiledRules, 'datePatterns' | 'dateParser'>): string[] {
  const hits = new Set<string>();

  for (const pattern of rules.datePatterns) {
    for (const match of unit.matchAll(pattern)) {
      const iso = parseDate(match[0], rules.dateParser);
      if (iso) {
        hits.add(iso);
      }
    }
  }

  return Array.from(hits).sort();
}

/**
 * First event label (declaration order) whose patterns match the unit
 */
export function detectEventType(unit: string, events: readonly EventRule[]): EventLabel | null {
  const low = unit.toLowerCase();

  if (STATUTE_CUES.test(low) && !PROCEDURAL_CUES.test(low)) {
    return null;
  }

  for (const { label, patterns } of events) {
    if (patterns.some((pattern) => pattern.test(low))) {
      return label;
    }
  }

  return null;
}

export function confidenceFor(event: EventLabel | null, dates: readonly string[], sectionLabel: string): number {
  let score = 0;
  if (event) score += EVENT_WEIGHT;
  if (dates.length > 0) score += DATE_WEIGHT;
  if (PROCEEDINGS_SECTION.test(sectionLabel)) score += SECTION_WEIGHT;
  if (dates.length > 1) score -= AMBIGUITY_PENALTY;

  const clamped = Math.max(0, Math.min(1, score));
  return Math.round(clamped * 100) / 100;
}

/**
 * Evaluate every unit of a page and emit candidate rows
 */
export function parsePage(page: PageRecord, rules: CompiledRules, source: string = ''): CandidateRow[] {
  const rows: CandidateRow[] = [];
  const sections = buildSections(page.lines, rules.sectionPatterns);

  page.lines.forEach((line, index) => {
    for (const unit of splitUnits(line, rules)) {
      const dates = findDates(unit, rules);
      const event = detectEventType(unit, rules.events);
      if (dates.length === 0 && !event) {
        continue;
      }

      const section = sectionForIndex(sections, index);
      rows.push({
        date: dates[0] ?? '',
        event: event ?? GENERIC_EVENT,
        description: unit,
        location: `p.${page.page} / ${section}`,
        source,
        confidence: confidenceFor(event, dates, section),
        hasDate: dates.length > 0,
        hasEvent: event !== null,
      });
    }
  });

  return rows;
}
