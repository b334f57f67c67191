import { fileURLToPath } from 'url';
import { beforeAll, describe, expect, it } from 'vitest';
import { loadRules, type CompiledRules } from '../config/rules.js';
import type { CandidateRow } from '../core/types.js';
import type {
  ChatMessage,
  CompletionClient,
  CompletionResponse,
  CompletionSettings,
  JsonSchemaFormat,
} from './CompletionClient.js';
import { repairRow, SecondaryExtractor, uniqueChunks, type EscalationChunk } from './SecondaryExtractor.js';

const RULES_PATH = fileURLToPath(new URL('../../config/rules.yaml', import.meta.url));

type Handler = (prompt: string) => Promise<string>;

/**
 * In-process stand-in for a model provider
 */
class FakeCompletionClient implements CompletionClient {
  readonly provider = 'openai' as const;
  readonly calls: ChatMessage[][] = [];
  readonly formats: JsonSchemaFormat[] = [];
  readonly settings: CompletionSettings[] = [];
  private handler: Handler;

  constructor(handler: Handler) {
    this.handler = handler;
  }

  async complete(
    messages: ChatMessage[],
    responseFormat: JsonSchemaFormat,
    settings: CompletionSettings
  ): Promise<CompletionResponse> {
    this.calls.push(messages);
    this.formats.push(responseFormat);
    this.settings.push(settings);
    const user = messages.find((message) => message.role === 'user');
    return { content: await this.handler(user ? user.content : '') };
  }
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function candidate(description: string, overrides: Partial<CandidateRow> = {}): CandidateRow {
  return {
    date: '',
    event: 'Event',
    description,
    location: 'p.3 / PROCEEDINGS',
    source: 'case.txt',
    confidence: 0.4,
    hasDate: false,
    hasEvent: false,
    ...overrides,
  };
}

function reply(rows: Array<Record<string, unknown>>): string {
  return JSON.stringify({ rows });
}

const CHUNK: EscalationChunk = { text: 'chunk text', location: 'p.3 / PROCEEDINGS', source: 'case.txt' };

let rules: CompiledRules;

beforeAll(async () => {
  rules = await loadRules(RULES_PATH);
});

describe('uniqueChunks', () => {
  it('dedupes by description, location and source in first-seen order', () => {
    const chunks = uniqueChunks([
      candidate('B'),
      candidate('A'),
      candidate('B', { confidence: 0.1 }),
      candidate('B', { location: 'p.4 / BODY' }),
    ]);

    expect(chunks).toEqual([
      { text: 'B', location: 'p.3 / PROCEEDINGS', source: 'case.txt' },
      { text: 'A', location: 'p.3 / PROCEEDINGS', source: 'case.txt' },
      { text: 'B', location: 'p.4 / BODY', source: 'case.txt' },
    ]);
  });
});

describe('repairRow', () => {
  it('recovers the date from the description and trusts only the chunk location', () => {
    const row = repairRow(
      {
        date: '',
        event: 'hearing',
        description: 'Matter heard on 3rd March, 2020',
        page_section: 'p.99 / ELSEWHERE',
        source: 'forged.txt',
      },
      CHUNK,
      rules
    );

    expect(row).toEqual({
      date: '2020-03-03',
      event: 'Hearing',
      description: 'Matter heard on 3rd March, 2020',
      location: 'p.3 / PROCEEDINGS',
      source: 'case.txt',
    });
  });

  it('normalizes parseable dates to ISO', () => {
    expect(repairRow({ date: ' 12.03.2020 ', event: 'Order', description: 'x' }, CHUNK, rules)?.date).toBe('2020-03-12');
  });

  it('keeps an unparseable date as given', () => {
    expect(repairRow({ date: 'sometime', description: 'x' }, CHUNK, rules)?.date).toBe('sometime');
  });

  it('discards rows with no recoverable date', () => {
    expect(repairRow({ event: 'Order', description: 'The order was passed' }, CHUNK, rules)).toBeNull();
    expect(repairRow({}, CHUNK, rules)).toBeNull();
  });

  it('clamps labels to the vocabulary', () => {
    expect(repairRow({ date: '2020-01-01', event: 'Arrest' }, CHUNK, rules)?.event).toBe('Event');
    expect(repairRow({ date: '2020-01-01', event: null }, CHUNK, rules)?.event).toBe('Event');
    expect(repairRow({ date: '2020-01-01', event: ' bail ' }, CHUNK, rules)?.event).toBe('Bail');
  });

  it('coerces non-text fields and caps the description', () => {
    const row = repairRow({ date: '2020-01-01', description: 'y'.repeat(450), event: 42 }, CHUNK, rules);

    expect(row?.description).toHaveLength(400);
    expect(row?.event).toBe('Event');
  });
});

describe('SecondaryExtractor', () => {
  it('sends one request per unique chunk with the chunk metadata', async () => {
    const client = new FakeCompletionClient(async () => reply([]));
    const extractor = new SecondaryExtractor(client, rules, { maxConcurrentCalls: 2 });

    const result = await extractor.extractAll([candidate('Next date 10.10.2020'), candidate('Next date 10.10.2020')]);

    expect(result).toEqual({ chunkCount: 1, failedChunks: 0, rows: [] });
    expect(client.calls).toHaveLength(1);
    expect(client.calls[0][0].role).toBe('system');
    expect(client.calls[0][1].content).toContain('page_section: p.3 / PROCEEDINGS');
    expect(client.calls[0][1].content).toContain('source: case.txt');
    expect(client.calls[0][1].content).toContain('"""Next date 10.10.2020"""');
    expect(client.formats[0].name).toBe('TimelineEvents');
  });

  it('asks for deterministic output with the configured model', async () => {
    const client = new FakeCompletionClient(async () => reply([]));
    const extractor = new SecondaryExtractor(client, rules, { maxConcurrentCalls: 1, model: 'test-model' });

    await extractor.extract(CHUNK);

    expect(client.settings).toEqual([{ model: 'test-model', temperature: 0 }]);
  });

  it('truncates long chunk text', async () => {
    const client = new FakeCompletionClient(async () => reply([]));
    const extractor = new SecondaryExtractor(client, rules, { maxConcurrentCalls: 1 });

    await extractor.extract({ ...CHUNK, text: 'a'.repeat(7000) });

    expect(client.calls[0][1].content).toContain(`"""${'a'.repeat(6000)}"""`);
  });

  it('isolates failed chunks and joins results in chunk order', async () => {
    const client = new FakeCompletionClient(async (prompt) => {
      if (prompt.includes('first')) {
        await delay(30);
        return reply([{ date: '01.01.2020', event: 'Filing', description: 'first' }]);
      }
      if (prompt.includes('second')) {
        throw new Error('provider unavailable');
      }
      if (prompt.includes('third')) {
        return 'no events here';
      }
      return '```json\n' + reply([{ date: '2020-02-02', event: 'Order', description: 'fourth' }]) + '\n```';
    });
    const extractor = new SecondaryExtractor(client, rules, { maxConcurrentCalls: 4 });

    const result = await extractor.extractAll([
      candidate('first'),
      candidate('second'),
      candidate('third'),
      candidate('fourth'),
    ]);

    expect(result.chunkCount).toBe(4);
    expect(result.failedChunks).toBe(2);
    expect(result.rows.map((row) => [row.date, row.event, row.description])).toEqual([
      ['2020-01-01', 'Filing', 'first'],
      ['2020-02-02', 'Order', 'fourth'],
    ]);
  });

  it('treats a reply without a rows array as a failure', async () => {
    const client = new FakeCompletionClient(async () => JSON.stringify({ events: [] }));
    const extractor = new SecondaryExtractor(client, rules, { maxConcurrentCalls: 1 });

    const result = await extractor.extractAll([candidate('x')]);

    expect(result).toEqual({ chunkCount: 1, failedChunks: 1, rows: [] });
  });

  it('never has more calls in flight than allowed', async () => {
    let inFlight = 0;
    let peak = 0;
    const client = new FakeCompletionClient(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(10);
      inFlight--;
      return reply([]);
    });
    const extractor = new SecondaryExtractor(client, rules, { maxConcurrentCalls: 2 });

    await extractor.extractAll(['a', 'b', 'c', 'd', 'e'].map((text) => candidate(text)));

    expect(client.calls).toHaveLength(5);
    expect(peak).toBe(2);
  });
});
