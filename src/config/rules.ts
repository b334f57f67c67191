import fs from 'fs/promises';
import yaml from 'js-yaml';
import {
  DEFAULT_DATE_SETTINGS,
  isSupportedLanguage,
  type DateOrder,
  type DateParserSettings,
} from '../core/dates.js';
import { isEventLabel, type EventLabel } from '../core/events.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { validator } from '../utils/validators.js';

/**
 * Rule Configuration
 *
 * Loads the YAML rule file (heading patterns, date patterns, event patterns,
 * date parser settings, unit splitting) and compiles it once into an
 * immutable value that is passed to every component that needs it.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Rule file as written in YAML
 */
export interface RawRules {
  section_patterns: string[];
  date_patterns: string[];
  events: Record<string, string[]>;
  date_parsing?: {
    languages?: string[];
    order?: DateOrder;
  };
  line_break_is_boundary?: boolean;
  sentence_delimiters?: string[];
}

export interface EventRule {
  readonly label: EventLabel;
  readonly patterns: readonly RegExp[];
}

export interface CompiledRules {
  readonly sectionPatterns: readonly RegExp[];
  /** Compiled with the global flag, for matchAll */
  readonly datePatterns: readonly RegExp[];
  /** Declaration order of the rule file; the first matching label wins */
  readonly events: readonly EventRule[];
  readonly dateParser: DateParserSettings;
  readonly lineBreakIsBoundary: boolean;
  readonly delimiters: readonly string[];
}

// ============================================================================
// Schema
// ============================================================================

const RULES_SCHEMA = {
  type: 'object',
  required: ['section_patterns', 'date_patterns', 'events'],
  properties: {
    section_patterns: { type: 'array', items: { type: 'string' } },
    date_patterns: { type: 'array', minItems: 1, items: { type: 'string' } },
    events: {
      type: 'object',
      additionalProperties: { type: 'array', items: { type: 'string' } },
    },
    date_parsing: {
      type: 'object',
      properties: {
        languages: { type: 'array', minItems: 1, items: { type: 'string' } },
        order: { type: 'string', enum: ['DMY', 'MDY', 'YMD'] },
      },
    },
    line_break_is_boundary: { type: 'boolean' },
    sentence_delimiters: { type: 'array', minItems: 1, items: { type: 'string', minLength: 1 } },
  },
};

const validateRules = validator.compileSchema<RawRules>(RULES_SCHEMA);

// ============================================================================
// Compilation
// ============================================================================

function compilePattern(key: string, source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new ConfigError(key, `unparsable pattern /${source}/: ${errorMessage(error)}`);
  }
}

function compileEvents(events: Record<string, string[]>): EventRule[] {
  return Object.entries(events).map(([label, patterns]) => {
    if (!isEventLabel(label)) {
      throw new ConfigError(`events.${label}`, 'label is not part of the event vocabulary');
    }
    return {
      label,
      patterns: patterns.map((p) => compilePattern(`events.${label}`, p, 'i')),
    };
  });
}

function compileDateSettings(raw: RawRules['date_parsing']): DateParserSettings {
  const languages = raw?.languages ?? DEFAULT_DATE_SETTINGS.languages;
  for (const language of languages) {
    if (!isSupportedLanguage(language)) {
      throw new ConfigError('date_parsing.languages', `unsupported language '${language}'`);
    }
  }

  return {
    languages,
    dateOrder: raw?.order ?? DEFAULT_DATE_SETTINGS.dateOrder,
  };
}

/**
 * Validate and compile an in-memory rule object
 */
export function compileRules(raw: unknown): CompiledRules {
  const result = validator.validate(validateRules, raw);
  if (!result.valid || !result.data) {
    throw new ConfigError('rules', `\n${validator.formatErrors(result.errors)}`);
  }

  const rules = result.data;
  return {
    sectionPatterns: rules.section_patterns.map((p) => compilePattern('section_patterns', p, 'i')),
    datePatterns: rules.date_patterns.map((p) => compilePattern('date_patterns', p, 'gi')),
    events: compileEvents(rules.events),
    dateParser: compileDateSettings(rules.date_parsing),
    lineBreakIsBoundary: rules.line_break_is_boundary ?? true,
    delimiters: rules.sentence_delimiters ?? ['.'],
  };
}

/**
 * Read, validate and compile a YAML rule file
 */
export async function loadRules(rulesPath: string): Promise<CompiledRules> {
  let content: string;
  try {
    content = await fs.readFile(rulesPath, 'utf-8');
  } catch (error) {
    throw new ConfigError('rules', `cannot read ${rulesPath}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError('rules', `cannot parse ${rulesPath}: ${errorMessage(error)}`);
  }

  return compileRules(raw);
}
