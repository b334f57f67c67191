import type { Section } from './types.js';

/**
 * Section Chunker
 *
 * Labels every line of a page with its enclosing section. A heading opens a
 * new section; lines before the first heading (or pages without headings)
 * belong to BODY.
 */

export const DEFAULT_SECTION = 'BODY';

const MAX_HEADING_LENGTH = 80;
const MIN_UPPERCASE_RATIO = 0.6;

/**
 * Share of uppercase letters among all letters (0 when there are none)
 */
export function uppercaseRatio(text: string): number {
  const letters = Array.from(text).filter((c) => /\p{L}/u.test(c));
  if (letters.length === 0) {
    return 0;
  }
  const caps = letters.filter((c) => /\p{Lu}/u.test(c));
  return caps.length / letters.length;
}

/**
 * A heading is short, mostly uppercase, and matches a configured pattern
 */
export function isSectionHeading(line: string, patterns: readonly RegExp[]): boolean {
  const trimmed = line.trim();
  if (trimmed.length > MAX_HEADING_LENGTH) {
    return false;
  }
  if (uppercaseRatio(trimmed) < MIN_UPPERCASE_RATIO) {
    return false;
  }
  return patterns.some((pattern) => pattern.test(trimmed));
}

/**
 * Single forward scan over the lines; sections come out ascending by start
 */
export function buildSections(lines: readonly string[], patterns: readonly RegExp[]): Section[] {
  const sections: Section[] = [];

  lines.forEach((line, index) => {
    if (isSectionHeading(line, patterns)) {
      sections.push({ label: line.trim(), start: index });
    }
  });

  if (sections.length === 0) {
    return [{ label: DEFAULT_SECTION, start: 0 }];
  }
  return sections;
}

/**
 * Label of the last section starting at or before `index`
 */
export function sectionForIndex(sections: readonly Section[], index: number): string {
  let label = DEFAULT_SECTION;

  for (const section of sections) {
    if (section.start > index) {
      break;
    }
    label = section.label;
  }

  return label;
}
