import { AnthropicConfig } from '../config/anthropic.js';
import { OpenAIConfig } from '../config/openai.js';
import type { ExtractorProvider, Settings } from '../config/settings.js';
import { logger } from '../utils/logger.js';
import { ClaudeConcurrentClient } from './ClaudeConcurrentClient.js';
import type { CompletionClient } from './CompletionClient.js';
import { OpenAIConcurrentClient } from './OpenAIConcurrentClient.js';

/**
 * Provider Factory
 *
 * Creates the completion client for the configured secondary extractor provider
 */
export class ProviderFactory {
  /**
   * Create completion client instance
   *
   * @param settings Runtime settings (provider, model, timeouts, keys)
   */
  static createClient(settings: Settings): CompletionClient {
    switch (settings.llmProvider) {
      case 'openai':
        logger.info('Using OpenAI Responses API for secondary extraction', { model: settings.llmModel });
        return new OpenAIConcurrentClient(settings);

      case 'anthropic':
        logger.info('Using Anthropic Messages API for secondary extraction', { model: settings.llmModel });
        return new ClaudeConcurrentClient(settings);
    }
  }

  /**
   * Validate provider configuration
   *
   * @param provider Provider type to validate
   * @param settings Runtime settings holding the credentials
   */
  static validateProvider(provider: ExtractorProvider, settings: Settings): boolean {
    return provider === 'openai' ? OpenAIConfig.validate(settings) : AnthropicConfig.validate(settings);
  }
}
