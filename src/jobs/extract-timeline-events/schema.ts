/**
 * Output JSON Schemas for extract-timeline-events
 *
 * TIMELINE_EVENTS_SCHEMA is sent to the provider as the structured output
 * format. RESPONSE_ENVELOPE_SCHEMA is what a reply must satisfy before its
 * rows are repaired one by one: only the envelope is enforced, row fields are
 * coerced afterwards.
 */

export const TIMELINE_EVENTS_SCHEMA_NAME = 'TimelineEvents';

export const TIMELINE_EVENTS_SCHEMA: Record<string, unknown> = {
  type: 'object',
  required: ['rows'],
  additionalProperties: false,
  properties: {
    rows: {
      type: 'array',
      items: {
        type: 'object',
        required: ['date', 'event', 'description', 'page_section', 'source'],
        additionalProperties: false,
        properties: {
          date: { type: 'string' },
          event: { type: 'string' },
          description: { type: 'string' },
          page_section: { type: 'string' },
          source: { type: 'string' },
        },
      },
    },
  },
};

export interface ResponseEnvelope {
  rows: Array<Record<string, unknown>>;
}

export const RESPONSE_ENVELOPE_SCHEMA = {
  type: 'object',
  required: ['rows'],
  properties: {
    rows: {
      type: 'array',
      items: { type: 'object' },
    },
  },
};
