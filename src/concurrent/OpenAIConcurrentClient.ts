import OpenAI from 'openai';
import { OpenAIConfig } from '../config/openai.js';
import type { Settings } from '../config/settings.js';
import { ScopedLogger } from '../utils/logger.js';
import type {
  ChatMessage,
  CompletionClient,
  CompletionResponse,
  CompletionSettings,
  JsonSchemaFormat,
} from './CompletionClient.js';
import { retryWithBackoff } from './retry.js';

/**
 * OpenAI Concurrent Client
 *
 * Wrapper for OpenAI Responses API with structured outputs support.
 * Handles retry logic on rate limits and per-request timeouts; concurrency
 * is bounded by the caller.
 */
export class OpenAIConcurrentClient implements CompletionClient {
  readonly provider = 'openai' as const;
  private client: OpenAI;
  private logger: ScopedLogger;
  private defaultModel: string;
  private timeoutMs: number;
  private maxRetries: number;

  constructor(settings: Settings, client?: OpenAI) {
    this.client = client ?? OpenAIConfig.createClient(settings);
    this.defaultModel = settings.llmModel;
    this.timeoutMs = settings.llmTimeoutMs;
    this.maxRetries = settings.llmMaxRetries;
    this.logger = new ScopedLogger(`OpenAI:${this.defaultModel}`);
  }

  /**
   * Make a Responses API request with structured outputs
   *
   * @param messages Chat messages (system + user)
   * @param responseFormat JSON schema the output must follow
   * @param settings Completion settings (model, temperature)
   */
  async complete(
    messages: ChatMessage[],
    responseFormat: JsonSchemaFormat,
    settings: CompletionSettings
  ): Promise<CompletionResponse> {
    return retryWithBackoff(
      async () => {
        const response = await this.client.responses.create(
          {
            model: settings.model || this.defaultModel,
            input: messages.map((msg) => ({ role: msg.role, content: msg.content })),
            text: {
              format: {
                type: 'json_schema',
                name: responseFormat.name,
                schema: responseFormat.schema,
                strict: responseFormat.strict ?? true,
              },
            },
            ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
          },
          { timeout: this.timeoutMs }
        );

        return {
          content: response.output_text,
          usage: response.usage
            ? {
                promptTokens: response.usage.input_tokens,
                completionTokens: response.usage.output_tokens,
                totalTokens: response.usage.input_tokens + response.usage.output_tokens,
              }
            : undefined,
        };
      },
      {
        maxRetries: this.maxRetries,
        isRateLimitError: (error) => error instanceof OpenAI.RateLimitError,
        retryAfter: (error) => (error instanceof OpenAI.APIError ? error.headers?.['retry-after'] : undefined),
        logger: this.logger,
      }
    );
  }
}
