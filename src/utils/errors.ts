/**
 * Error types raised by the pipeline
 *
 * ConfigError is fatal at startup. DocumentLoadError and ExtractorResponseError
 * are caught by the pipeline and only cost the affected document or chunk.
 */

export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid configuration '${key}': ${message}`);
    this.name = 'ConfigError';
    this.key = key;
  }
}

export class DocumentLoadError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to load ${filePath}: ${reason}`, { cause });
    this.name = 'DocumentLoadError';
    this.filePath = filePath;
  }
}

export class ExtractorResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractorResponseError';
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
