import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CompletionClient, CompletionResponse } from '../concurrent/CompletionClient.js';
import { SecondaryExtractor } from '../concurrent/SecondaryExtractor.js';
import { loadRules, type CompiledRules } from '../config/rules.js';
import { loadSettings } from '../config/settings.js';
import { TimelinePipeline } from './TimelinePipeline.js';

const mocks = vi.hoisted(() => ({
  extractRawText: vi.fn(),
}));

vi.mock('mammoth', () => ({
  default: { extractRawText: mocks.extractRawText },
}));

const RULES_PATH = fileURLToPath(new URL('../../config/rules.yaml', import.meta.url));

class ScriptedClient implements CompletionClient {
  readonly provider = 'anthropic' as const;
  calls = 0;
  private content: string;

  constructor(content: string) {
    this.content = content;
  }

  async complete(): Promise<CompletionResponse> {
    this.calls++;
    return { content: this.content };
  }
}

let rules: CompiledRules;

beforeAll(async () => {
  rules = await loadRules(RULES_PATH);
});

describe('TimelinePipeline', () => {
  let dir: string;

  beforeEach(async () => {
    mocks.extractRawText.mockReset();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'timeline-pipeline-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('extracts, merges and sorts rows across documents', async () => {
    const caseFile = path.join(dir, 'a-case.txt');
    const orderFile = path.join(dir, 'b-order.txt');
    await fs.writeFile(
      caseFile,
      [
        'PROCEEDINGS',
        'Hearing adjourned to 12.03.2020 for further evidence',
        'Notice issued on 01.02.2020 returnable on 15.03.2020',
        'It was held that the suit was filed on 05.05.2019',
        'Hearing adjourned to 12.03.2020 for further evidence',
      ].join('\n')
    );
    await fs.writeFile(orderFile, '104 Order passed on 01.01.2021\n');
    await fs.writeFile(path.join(dir, 'notes.md'), 'Hearing on 01.01.2020');

    const pipeline = new TimelinePipeline(loadSettings({}), rules);
    const { rows, summary } = await pipeline.run(dir);

    expect(rows).toEqual([
      {
        DATE: '2019-05-05',
        EVENT: 'Filing',
        DESCRIPTION: 'It was held that the suit was filed on 05.05.2019',
        'PAGE/SECTION': 'p.1 / PROCEEDINGS',
        SOURCE: caseFile,
      },
      {
        DATE: '2020-02-01',
        EVENT: 'Notice',
        DESCRIPTION: 'Notice issued on 01.02.2020 returnable on 15.03.2020',
        'PAGE/SECTION': 'p.1 / PROCEEDINGS',
        SOURCE: caseFile,
      },
      {
        DATE: '2020-03-12',
        EVENT: 'Adjournment',
        DESCRIPTION: 'Hearing adjourned to 12.03.2020 for further evidence',
        'PAGE/SECTION': 'p.1 / PROCEEDINGS',
        SOURCE: caseFile,
      },
      {
        DATE: '2021-01-01',
        EVENT: 'Order',
        DESCRIPTION: 'Order passed on 01.01.2021',
        'PAGE/SECTION': 'p.104 / BODY',
        SOURCE: orderFile,
      },
    ]);
    expect(summary).toEqual({
      documents: 2,
      skippedDocuments: 0,
      ruleRows: 5,
      escalatedChunks: 0,
      failedChunks: 0,
      secondaryRows: 0,
      emittedRows: 4,
    });
  });

  it('skips documents that fail to load', async () => {
    mocks.extractRawText.mockRejectedValue(new Error('Corrupted zip'));
    await fs.writeFile(path.join(dir, 'broken.docx'), 'not a zip');
    await fs.writeFile(path.join(dir, 'ok.txt'), 'Appeal filed on 02.02.2022');

    const { rows, summary } = await new TimelinePipeline(loadSettings({}), rules).run(dir);

    expect(rows.map((row) => row.SOURCE)).toEqual([path.join(dir, 'ok.txt')]);
    expect(summary.documents).toBe(2);
    expect(summary.skippedDocuments).toBe(1);
  });

  it('adds repaired secondary rows for escalated units', async () => {
    const file = path.join(dir, 'case.txt');
    await fs.writeFile(file, 'PROCEEDINGS\nNext date fixed as 10.10.2020\n');
    const client = new ScriptedClient(
      JSON.stringify({
        rows: [
          {
            date: '10.10.2020',
            event: 'hearing',
            description: 'Next date of hearing fixed as 10.10.2020',
            page_section: 'p.7',
            source: 'other.txt',
          },
        ],
      })
    );
    const extractor = new SecondaryExtractor(client, rules, { maxConcurrentCalls: 2 });

    const pipeline = new TimelinePipeline(loadSettings({ USE_LLM: 'true' }), rules, { extractor });
    const { rows, summary } = await pipeline.run(file);

    expect(client.calls).toBe(1);
    expect(rows).toEqual([
      {
        DATE: '2020-10-10',
        EVENT: 'Event',
        DESCRIPTION: 'Next date fixed as 10.10.2020',
        'PAGE/SECTION': 'p.1 / PROCEEDINGS',
        SOURCE: file,
      },
      {
        DATE: '2020-10-10',
        EVENT: 'Hearing',
        DESCRIPTION: 'Next date of hearing fixed as 10.10.2020',
        'PAGE/SECTION': 'p.1 / PROCEEDINGS',
        SOURCE: file,
      },
    ]);
    expect(summary).toMatchObject({ escalatedChunks: 1, failedChunks: 0, secondaryRows: 1, emittedRows: 2 });
  });

  it('does not call the extractor when USE_LLM is off', async () => {
    const file = path.join(dir, 'case.txt');
    await fs.writeFile(file, 'Next date fixed as 10.10.2020\n');
    const client = new ScriptedClient('{"rows":[]}');
    const extractor = new SecondaryExtractor(client, rules, { maxConcurrentCalls: 2 });

    const { rows } = await new TimelinePipeline(loadSettings({}), rules, { extractor }).run(file);

    expect(client.calls).toBe(0);
    expect(rows.map((row) => row.EVENT)).toEqual(['Event']);
  });

  it('gives the same output on repeated runs', async () => {
    const file = path.join(dir, 'case.txt');
    await fs.writeFile(file, 'Bail granted on 03.04.2020\nHearing held on 01.04.2020\n');
    const pipeline = new TimelinePipeline(loadSettings({}), rules);

    const first = await pipeline.run(dir);
    const second = await pipeline.run(dir);

    expect(second.rows).toEqual(first.rows);
    expect(first.rows.map((row) => row.EVENT)).toEqual(['Hearing', 'Bail']);
  });
});
