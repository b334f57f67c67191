/**
 * Closed event vocabulary
 *
 * Every row leaving the pipeline carries one of these labels. `Event` is the
 * generic fallback for dated units with no specific match and for any label
 * that does not belong to the vocabulary.
 */

export const EVENT_LABELS = [
  'Filing',
  'Hearing',
  'Order',
  'Adjournment',
  'Notice',
  'Bail',
  'Charge',
  'Evidence',
  'Judgment',
  'Application',
  'Service',
  'Settlement',
  'Lease',
  'Appeal',
  'Event',
] as const;

export type EventLabel = (typeof EVENT_LABELS)[number];

export const GENERIC_EVENT: EventLabel = 'Event';

const EVENT_LABEL_SET: ReadonlySet<string> = new Set(EVENT_LABELS);

export function isEventLabel(value: string): value is EventLabel {
  return EVENT_LABEL_SET.has(value);
}

/**
 * Title-case each word: first letter upper, the rest lower.
 * A word starts after any non-letter character.
 */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_, boundary: string, letter: string) => {
    return boundary + letter.toUpperCase();
  });
}

/**
 * Trim, title-case and clamp a raw label to the vocabulary
 */
export function normalizeEventLabel(raw: string | null | undefined): EventLabel {
  const label = titleCase((raw ?? '').trim());
  return isEventLabel(label) ? label : GENERIC_EVENT;
}
