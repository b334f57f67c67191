import OpenAI from 'openai';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Settings } from './settings.js';

/**
 * OpenAI Configuration
 *
 * Builds the OpenAI client used by the secondary extractor from explicit
 * settings. SDK-level retries are disabled; rate-limit retries are handled by
 * the concurrent client so LLM_MAX_RETRIES is the single knob.
 */
export class OpenAIConfig {
  /**
   * Get required configuration
   */
  static getConfig(settings: Settings) {
    const apiKey = settings.openaiApiKey;

    if (!apiKey) {
      throw new ConfigError(
        'OPENAI_API_KEY',
        'missing OpenAI API key. Please ensure OPENAI_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      model: settings.llmModel,
      timeoutMs: settings.llmTimeoutMs,
    };
  }

  /**
   * Create an OpenAI client
   */
  static createClient(settings: Settings): OpenAI {
    const config = this.getConfig(settings);

    const client = new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });

    logger.info('OpenAI client initialized', { model: config.model, timeoutMs: config.timeoutMs });
    return client;
  }

  /**
   * Validate OpenAI configuration without creating client
   */
  static validate(settings: Settings): boolean {
    try {
      this.getConfig(settings);
      return true;
    } catch (error) {
      logger.warn('OpenAI configuration invalid', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
