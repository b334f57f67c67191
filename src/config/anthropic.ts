import Anthropic from '@anthropic-ai/sdk';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Settings } from './settings.js';

/**
 * Anthropic Configuration
 *
 * Builds the Anthropic client used by the secondary extractor from explicit
 * settings.
 */
export class AnthropicConfig {
  /**
   * Get required configuration
   */
  static getConfig(settings: Settings) {
    const apiKey = settings.anthropicApiKey;

    if (!apiKey) {
      throw new ConfigError(
        'ANTHROPIC_API_KEY',
        'missing Anthropic API key. Please ensure ANTHROPIC_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      model: settings.llmModel,
      timeoutMs: settings.llmTimeoutMs,
    };
  }

  /**
   * Create an Anthropic client
   */
  static createClient(settings: Settings): Anthropic {
    const config = this.getConfig(settings);

    const client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });

    logger.info('Anthropic client initialized', { model: config.model, timeoutMs: config.timeoutMs });
    return client;
  }

  /**
   * Validate Anthropic configuration without creating client
   */
  static validate(settings: Settings): boolean {
    try {
      this.getConfig(settings);
      return true;
    } catch (error) {
      logger.warn('Anthropic configuration invalid', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
