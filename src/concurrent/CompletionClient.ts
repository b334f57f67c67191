import type { ExtractorProvider } from '../config/settings.js';

/**
 * Provider-neutral contract for the secondary extractor's model calls
 */

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/**
 * Structured output format (JSON schema the model must follow)
 */
export interface JsonSchemaFormat {
  name: string;
  schema: Record<string, unknown>;
  strict?: boolean;
}

/**
 * Completion Settings
 */
export interface CompletionSettings {
  model?: string;
  temperature?: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResponse {
  content: string;
  usage?: TokenUsage;
}

export interface CompletionClient {
  readonly provider: ExtractorProvider;
  complete(
    messages: ChatMessage[],
    responseFormat: JsonSchemaFormat,
    settings: CompletionSettings
  ): Promise<CompletionResponse>;
}
