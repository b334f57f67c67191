import Anthropic from '@anthropic-ai/sdk';
import { AnthropicConfig } from '../config/anthropic.js';
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

const DEFAULT_MAX_TOKENS = 4096;

/**
 * Claude Concurrent Client
 *
 * Wrapper for Anthropic Messages API. Claude has no schema-enforced output
 * mode here, so the schema is spelled out in the system prompt and the
 * caller validates the reply.
 */
export class ClaudeConcurrentClient implements CompletionClient {
  readonly provider = 'anthropic' as const;
  private client: Anthropic;
  private logger: ScopedLogger;
  private defaultModel: string;
  private timeoutMs: number;
  private maxRetries: number;

  constructor(settings: Settings, client?: Anthropic) {
    this.client = client ?? AnthropicConfig.createClient(settings);
    this.defaultModel = settings.llmModel;
    this.timeoutMs = settings.llmTimeoutMs;
    this.maxRetries = settings.llmMaxRetries;
    this.logger = new ScopedLogger(`Claude:${this.defaultModel}`);
  }

  /**
   * Make a Messages API request and normalize the reply
   *
   * @param messages Chat messages (system extracted separately)
   * @param responseFormat JSON schema the reply must follow
   * @param settings Completion settings (model, temperature)
   */
  async complete(
    messages: ChatMessage[],
    responseFormat: JsonSchemaFormat,
    settings: CompletionSettings
  ): Promise<CompletionResponse> {
    const systemPrompt = this.buildSystemPrompt(messages, responseFormat);
    const conversation = messages
      .filter((msg) => msg.role === 'user')
      .map((msg) => ({ role: 'user' as const, content: msg.content }));

    return retryWithBackoff(
      async () => {
        const response = await this.client.messages.create(
          {
            model: settings.model || this.defaultModel,
            max_tokens: DEFAULT_MAX_TOKENS,
            system: systemPrompt,
            messages: conversation,
            ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
          },
          { timeout: this.timeoutMs }
        );

        let content = '';
        for (const block of response.content) {
          if (block.type === 'text') {
            content += block.text;
          }
        }

        return {
          content,
          usage: {
            promptTokens: response.usage.input_tokens,
            completionTokens: response.usage.output_tokens,
            totalTokens: response.usage.input_tokens + response.usage.output_tokens,
          },
        };
      },
      {
        maxRetries: this.maxRetries,
        isRateLimitError: (error) => error instanceof Anthropic.RateLimitError,
        retryAfter: (error) => (error instanceof Anthropic.APIError ? error.headers?.['retry-after'] : undefined),
        logger: this.logger,
      }
    );
  }

  private buildSystemPrompt(messages: ChatMessage[], responseFormat: JsonSchemaFormat): string {
    const system = messages
      .filter((msg) => msg.role === 'system')
      .map((msg) => msg.content)
      .join('\n\n');

    return (
      `${system}\n\nYou must respond with valid JSON that matches this exact schema:\n` +
      `\`\`\`json\n${JSON.stringify(responseFormat.schema, null, 2)}\n\`\`\`\n\n` +
      'IMPORTANT: Return ONLY the JSON object, no markdown formatting, no code blocks, no explanations.'
    );
  }
}
