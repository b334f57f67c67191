import type { SecondaryExtractor } from '../concurrent/SecondaryExtractor.js';
import type { CompiledRules } from '../config/rules.js';
import type { Settings } from '../config/settings.js';
import { isValidIsoDate } from '../core/dates.js';
import { selectForEscalation } from '../core/escalationGate.js';
import { dedupeRows, mergeDocumentRows, toTimelineRow } from '../core/merger.js';
import { parsePage } from '../core/ruleMatcher.js';
import type { CandidateRow, MergedRow, PageRecord, SecondaryRow, TimelineRow } from '../core/types.js';
import { discoverInputs, loadPages, type OcrProvider } from '../loaders/index.js';
import { sortTimeline } from '../output/timelineWriter.js';
import { errorMessage } from '../utils/errors.js';
import { ScopedLogger } from '../utils/logger.js';

/**
 * Timeline Pipeline
 *
 * Runs every input document through chunking, rule matching, escalation and
 * the per-document merge, then dedupes and sorts the combined rows.
 * Documents are processed one after another; only the secondary extractor
 * fans out.
 */

// ============================================================================
// Types
// ============================================================================

export interface PipelineDependencies {
  /** Only consulted when settings.useLlm is on */
  extractor?: SecondaryExtractor;
  ocr?: OcrProvider;
}

export interface DocumentResult {
  source: string;
  loaded: boolean;
  ruleRows: number;
  escalatedChunks: number;
  failedChunks: number;
  secondaryRows: number;
  rows: MergedRow[];
}

export interface RunSummary {
  documents: number;
  skippedDocuments: number;
  ruleRows: number;
  escalatedChunks: number;
  failedChunks: number;
  secondaryRows: number;
  emittedRows: number;
}

export interface RunResult {
  rows: TimelineRow[];
  summary: RunSummary;
}

// ============================================================================
// Pipeline
// ============================================================================

export class TimelinePipeline {
  private settings: Settings;
  private rules: CompiledRules;
  private deps: PipelineDependencies;
  private logger: ScopedLogger;

  constructor(settings: Settings, rules: CompiledRules, deps: PipelineDependencies = {}) {
    this.settings = settings;
    this.rules = rules;
    this.deps = deps;
    this.logger = new ScopedLogger('TimelinePipeline');
  }

  processPage(page: PageRecord, source: string): CandidateRow[] {
    return parsePage(page, this.rules, source);
  }

  /**
   * Rows of one document; the path as discovered is its source identifier
   */
  async processDocument(filePath: string): Promise<DocumentResult> {
    const source = filePath;
    const result: DocumentResult = {
      source,
      loaded: false,
      ruleRows: 0,
      escalatedChunks: 0,
      failedChunks: 0,
      secondaryRows: 0,
      rows: [],
    };

    let pages: PageRecord[];
    try {
      pages = await loadPages(filePath, { ocr: this.deps.ocr });
    } catch (error) {
      this.logger.warn('Skipping document that could not be loaded', {
        source,
        error: errorMessage(error),
      });
      return result;
    }
    result.loaded = true;

    const ruleRows = pages.flatMap((page) => this.processPage(page, source));
    result.ruleRows = ruleRows.length;

    let secondaryRows: SecondaryRow[] = [];
    const extractor = this.deps.extractor;
    if (this.settings.useLlm && extractor) {
      const escalated = selectForEscalation(ruleRows, this.settings.confidenceThreshold);
      if (escalated.length > 0) {
        const escalation = await extractor.extractAll(escalated);
        secondaryRows = escalation.rows;
        result.escalatedChunks = escalation.chunkCount;
        result.failedChunks = escalation.failedChunks;
      }
    }
    result.secondaryRows = secondaryRows.length;

    result.rows = mergeDocumentRows(ruleRows, secondaryRows);

    this.logger.info('Document processed', {
      source,
      pages: pages.length,
      ruleRows: result.ruleRows,
      escalatedChunks: result.escalatedChunks,
      secondaryRows: result.secondaryRows,
      mergedRows: result.rows.length,
    });

    return result;
  }

  /**
   * Process a file or every supported file under a directory
   */
  async run(inputPath: string): Promise<RunResult> {
    let files: string[];
    try {
      files = await discoverInputs(inputPath);
    } catch (error) {
      this.logger.failed(error, { inputPath });
      throw error;
    }
    this.logger.started({ inputPath, documents: files.length, useLlm: this.settings.useLlm });

    const summary: RunSummary = {
      documents: files.length,
      skippedDocuments: 0,
      ruleRows: 0,
      escalatedChunks: 0,
      failedChunks: 0,
      secondaryRows: 0,
      emittedRows: 0,
    };
    const merged: MergedRow[] = [];

    for (const file of files) {
      const document = await this.processDocument(file);
      if (!document.loaded) {
        summary.skippedDocuments++;
      }
      summary.ruleRows += document.ruleRows;
      summary.escalatedChunks += document.escalatedChunks;
      summary.failedChunks += document.failedChunks;
      summary.secondaryRows += document.secondaryRows;
      merged.push(...document.rows);
    }

    const rows = sortTimeline(
      dedupeRows(merged)
        .filter((row) => isValidIsoDate(row.date))
        .map(toTimelineRow)
    );
    summary.emittedRows = rows.length;

    this.logger.completed({ ...summary });
    return { rows, summary };
  }
}
