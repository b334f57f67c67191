/**
 * Timeline Event Extraction Prompt
 *
 * Template variables to replace:
 * - {{source}}
 * - {{pageSection}}
 * - {{chunkText}}
 */

import { EVENT_LABELS } from '../../core/events.js';

export const TIMELINE_SYSTEM_PROMPT = `You extract dated events from legal case documents for a case chronology.`;

export const TIMELINE_EVENTS_PROMPT = `# STRICT RULES
- Return ONLY rows that have an explicit date in the text.
- Normalize dates to YYYY-MM-DD if possible; if uncertain, keep the original date string.
- Use one of these event labels: ${EVENT_LABELS.join(', ')}.
- Keep description <= 2 lines and quote key phrase(s).
- Do not invent information not present in the text.
- If no dated events are found, return: {"rows":[]}.

# META
source: {{source}}
page_section: {{pageSection}}

# TEXT
"""{{chunkText}}"""
`;

export interface TimelinePromptInput {
  source: string;
  pageSection: string;
  chunkText: string;
}

/**
 * Fill the prompt template. Each variable is substituted once, in a single
 * pass, so chunk text containing "{{...}}" is left alone.
 */
export function createTimelinePrompt(input: TimelinePromptInput): string {
  return TIMELINE_EVENTS_PROMPT.replace(/\{\{(source|pageSection|chunkText)\}\}/g, (_, name: keyof TimelinePromptInput) => {
    return input[name];
  });
}
