#!/usr/bin/env node

import { ProviderFactory } from './concurrent/ProviderFactory.js';
import { SecondaryExtractor } from './concurrent/SecondaryExtractor.js';
import { loadRules, type CompiledRules } from './config/rules.js';
import { loadSettingsFromEnvironment, type Settings } from './config/settings.js';
import { writeTimeline } from './output/timelineWriter.js';
import { TimelinePipeline } from './pipeline/TimelinePipeline.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

/**
 * CLI for Legal Case Timeline Extraction
 *
 * Usage:
 *   timeline run --in <file|dir> --out <file.csv|file.json> [--rules <rules.yaml>]
 *   timeline check-config [--rules <rules.yaml>]
 *   timeline help
 */

const DEFAULT_RULES_PATH = 'config/rules.yaml';

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Value following `--name`, if any
 */
function readFlag(args: readonly string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  if (index === -1) {
    return undefined;
  }
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`--${name} requires a value`);
  }
  return value;
}

function createExtractor(settings: Settings, rules: CompiledRules): SecondaryExtractor | undefined {
  if (!settings.useLlm) {
    return undefined;
  }
  return new SecondaryExtractor(ProviderFactory.createClient(settings), rules, {
    maxConcurrentCalls: settings.llmMaxConcurrentCalls,
    model: settings.llmModel,
  });
}

/**
 * Extract a timeline and write it
 */
async function runExtraction(args: readonly string[]): Promise<void> {
  const inputPath = readFlag(args, 'in');
  const outPath = readFlag(args, 'out');
  if (!inputPath || !outPath) {
    throw new UsageError('--in and --out are required');
  }

  const settings = loadSettingsFromEnvironment();
  const rules = await loadRules(readFlag(args, 'rules') ?? DEFAULT_RULES_PATH);

  const pipeline = new TimelinePipeline(settings, rules, {
    extractor: createExtractor(settings, rules),
  });

  const { rows, summary } = await pipeline.run(inputPath);
  await writeTimeline(rows, outPath);

  console.log(`\nWrote ${rows.length} timeline rows to ${outPath}`);
  console.log(`   Documents: ${summary.documents} (${summary.skippedDocuments} skipped)`);
  console.log(`   Rule rows: ${summary.ruleRows}`);
  if (settings.useLlm) {
    console.log(`   Escalated chunks: ${summary.escalatedChunks} (${summary.failedChunks} failed)`);
    console.log(`   Secondary rows: ${summary.secondaryRows}`);
  }
}

/**
 * Validate settings and rules, report provider readiness
 */
async function checkConfig(args: readonly string[]): Promise<void> {
  const settings = loadSettingsFromEnvironment();
  const rulesPath = readFlag(args, 'rules') ?? DEFAULT_RULES_PATH;
  const rules = await loadRules(rulesPath);

  console.log('\nConfiguration\n');
  console.log(`Rules: ${rulesPath}`);
  console.log(`   Section patterns: ${rules.sectionPatterns.length}`);
  console.log(`   Date patterns: ${rules.datePatterns.length}`);
  console.log(`   Event labels: ${rules.events.map((event) => event.label).join(', ')}`);
  console.log(`   Date languages: ${rules.dateParser.languages.join(', ')} (${rules.dateParser.dateOrder})`);

  console.log(`\nSecondary extractor: ${settings.useLlm ? 'enabled' : 'disabled'}`);
  console.log(`   Provider: ${settings.llmProvider} (${settings.llmModel})`);
  console.log(`   Max concurrent calls: ${settings.llmMaxConcurrentCalls}`);
  console.log(`   Confidence threshold: ${settings.confidenceThreshold}`);

  const ready = ProviderFactory.validateProvider(settings.llmProvider, settings);
  console.log(`   Credentials: ${ready ? 'OK' : 'missing'}`);

  if (settings.useLlm && !ready) {
    throw new ConfigError(
      settings.llmProvider === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY',
      'USE_LLM is on but the provider has no API key'
    );
  }
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Legal Case Timeline Extractor

Extracts dated procedural events from case files (PDF, DOCX, TXT) into a
chronological timeline.

USAGE:
  timeline <command> [options]

COMMANDS:
  run --in <path> --out <file>   Extract a timeline from a file or directory
      [--rules <rules.yaml>]     Rule file (default: ${DEFAULT_RULES_PATH})
  check-config [--rules <file>]  Validate settings and rules
  help                           Show this help message

OUTPUT:
  .json writes a JSON array; any other extension writes CSV with columns
  DATE,EVENT,DESCRIPTION,PAGE/SECTION,SOURCE

ENVIRONMENT:
  Configuration is loaded from .env file
    - USE_LLM (default false), LLM_PROVIDER (openai | anthropic), LLM_MODEL
    - LLM_MAX_CONCURRENT_CALLS (default 4), LLM_TIMEOUT_MS, LLM_MAX_RETRIES
    - CONFIDENCE_THRESHOLD (default 0.6)
    - OPENAI_API_KEY or ANTHROPIC_API_KEY when USE_LLM is on
    - LOG_LEVEL, LOG_DIR, LOG_SILENT

EXAMPLES:
  timeline run --in ./cases --out ./out/timeline.csv
  timeline run --in ./cases/appeal.pdf --out ./out/appeal.json --rules ./my-rules.yaml
  timeline check-config
`);
}

/**
 * Main CLI handler
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const flags = args.slice(1);

  if (!command || command === 'help') {
    printHelp();
    return;
  }

  try {
    switch (command) {
      case 'run':
        await runExtraction(flags);
        break;

      case 'check-config':
        await checkConfig(flags);
        break;

      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        process.exitCode = 1;
    }
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.error('Usage: timeline run --in <file|dir> --out <file> [--rules <rules.yaml>]');
    } else {
      logger.error('Command failed', { error: errorMessage(error) });
      console.error(`Error: ${errorMessage(error)}`);
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
