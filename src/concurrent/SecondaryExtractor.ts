import pLimit from 'p-limit';
import type { CompiledRules } from '../config/rules.js';
import { parseDate } from '../core/dates.js';
import { normalizeEventLabel } from '../core/events.js';
import { DESCRIPTION_LIMIT } from '../core/merger.js';
import { findDates } from '../core/ruleMatcher.js';
import type { CandidateRow, SecondaryRow } from '../core/types.js';
import { createTimelinePrompt, TIMELINE_SYSTEM_PROMPT } from '../jobs/extract-timeline-events/prompt.js';
import {
  RESPONSE_ENVELOPE_SCHEMA,
  TIMELINE_EVENTS_SCHEMA,
  TIMELINE_EVENTS_SCHEMA_NAME,
  type ResponseEnvelope,
} from '../jobs/extract-timeline-events/schema.js';
import { ExtractorResponseError } from '../utils/errors.js';
import { ScopedLogger } from '../utils/logger.js';
import { extractJsonFromResponse, validator } from '../utils/validators.js';
import type { CompletionClient } from './CompletionClient.js';

/**
 * Secondary Extractor
 *
 * Sends escalated chunks to the model provider and repairs what comes back.
 * Replies are untrusted: location and source are always taken from the chunk,
 * dates are re-parsed, labels clamped to the vocabulary. One call per unique
 * chunk, at most `maxConcurrentCalls` in flight; a failed call yields no rows
 * and never affects the others.
 */

export const MAX_CHUNK_CHARS = 6000;

export interface EscalationChunk {
  text: string;
  location: string;
  source: string;
}

export interface SecondaryExtractorOptions {
  maxConcurrentCalls: number;
  model?: string;
}

export interface EscalationResult {
  chunkCount: number;
  failedChunks: number;
  rows: SecondaryRow[];
}

interface ChunkOutcome {
  ok: boolean;
  rows: SecondaryRow[];
}

const validateEnvelope = validator.compileSchema<ResponseEnvelope>(RESPONSE_ENVELOPE_SCHEMA);

function asText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * One chunk per distinct (description, location, source), first-seen order
 */
export function uniqueChunks(rows: readonly CandidateRow[]): EscalationChunk[] {
  const chunks = new Map<string, EscalationChunk>();

  for (const row of rows) {
    const key = JSON.stringify([row.description, row.location, row.source]);
    if (!chunks.has(key)) {
      chunks.set(key, { text: row.description, location: row.location, source: row.source });
    }
  }

  return Array.from(chunks.values());
}

/**
 * Coerce one untrusted row; null when no date can be recovered
 */
export function repairRow(
  raw: Record<string, unknown>,
  chunk: EscalationChunk,
  rules: Pick<CompiledRules, 'datePatterns' | 'dateParser'>
): SecondaryRow | null {
  const description = asText(raw.description).trim();
  let date = asText(raw.date).trim();

  if (!date) {
    date = findDates(description, rules)[0] ?? '';
  }
  if (!date) {
    return null;
  }

  date = parseDate(date, rules.dateParser) ?? date;

  return {
    date,
    event: normalizeEventLabel(asText(raw.event)),
    description: description.slice(0, DESCRIPTION_LIMIT),
    location: chunk.location,
    source: chunk.source,
  };
}

export class SecondaryExtractor {
  private client: CompletionClient;
  private rules: CompiledRules;
  private options: SecondaryExtractorOptions;
  private logger: ScopedLogger;

  constructor(client: CompletionClient, rules: CompiledRules, options: SecondaryExtractorOptions) {
    this.client = client;
    this.rules = rules;
    this.options = options;
    this.logger = new ScopedLogger(`SecondaryExtractor:${client.provider}`);
  }

  /**
   * Extract rows from a single chunk (zero rows on any failure)
   */
  async extract(chunk: EscalationChunk): Promise<SecondaryRow[]> {
    const outcome = await this.extractChunk(chunk);
    return outcome.rows;
  }

  /**
   * Fan out over the unique chunks of the escalated rows and join the
   * results in chunk order, independent of completion order
   */
  async extractAll(rows: readonly CandidateRow[]): Promise<EscalationResult> {
    const chunks = uniqueChunks(rows);
    const limit = pLimit(this.options.maxConcurrentCalls);

    this.logger.info('Dispatching escalated chunks', {
      rows: rows.length,
      chunks: chunks.length,
      maxConcurrentCalls: this.options.maxConcurrentCalls,
    });

    const outcomes = await Promise.all(chunks.map((chunk) => limit(() => this.extractChunk(chunk))));

    return {
      chunkCount: chunks.length,
      failedChunks: outcomes.filter((outcome) => !outcome.ok).length,
      rows: outcomes.flatMap((outcome) => outcome.rows),
    };
  }

  private async extractChunk(chunk: EscalationChunk): Promise<ChunkOutcome> {
    try {
      const response = await this.client.complete(
        [
          { role: 'system', content: TIMELINE_SYSTEM_PROMPT },
          {
            role: 'user',
            content: createTimelinePrompt({
              source: chunk.source,
              pageSection: chunk.location,
              chunkText: chunk.text.slice(0, MAX_CHUNK_CHARS),
            }),
          },
        ],
        { name: TIMELINE_EVENTS_SCHEMA_NAME, schema: TIMELINE_EVENTS_SCHEMA, strict: true },
        { model: this.options.model, temperature: 0 }
      );

      const result = validator.validate(validateEnvelope, extractJsonFromResponse(response.content));
      if (!result.valid || !result.data) {
        throw new ExtractorResponseError(
          `Response does not match schema:\n${validator.formatErrors(result.errors)}`
        );
      }

      const repaired: SecondaryRow[] = [];
      for (const raw of result.data.rows) {
        const row = repairRow(raw, chunk, this.rules);
        if (row) {
          repaired.push(row);
        }
      }

      this.logger.debug('Chunk extracted', {
        source: chunk.source,
        location: chunk.location,
        returned: result.data.rows.length,
        kept: repaired.length,
        totalTokens: response.usage?.totalTokens,
      });
      return { ok: true, rows: repaired };
    } catch (error) {
      this.logger.error('Secondary extraction failed for chunk', error, {
        source: chunk.source,
        location: chunk.location,
      });
      return { ok: false, rows: [] };
    }
  }
}
