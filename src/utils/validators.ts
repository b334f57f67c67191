import AjvModule, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { ExtractorResponseError } from './errors.js';

/**
 * JSON Schema Validator
 *
 * Validates rule files and secondary extractor responses against expected schemas
 */

const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false, // Allow additional properties
});

/**
 * Validation Result
 */
export interface ValidationResult<T> {
  valid: boolean;
  errors?: ErrorObject[];
  data?: T;
}

/**
 * Validator class for JSON schema validation
 */
export class SchemaValidator {
  /**
   * Compile a schema into a type-guarding validator
   * @param schema JSON schema object
   */
  compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
    return ajv.compile<T>(schema);
  }

  /**
   * Validate data against a compiled schema
   * @param validate Validator returned by compileSchema()
   * @param data Data to validate
   */
  validate<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
    if (validate(data)) {
      return { valid: true, data };
    }

    return {
      valid: false,
      errors: validate.errors || undefined,
    };
  }

  /**
   * Format validation errors as a readable string
   * @param errors AJV error objects
   */
  formatErrors(errors?: ErrorObject[]): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        const params = JSON.stringify(error.params);
        return `  • ${path}: ${message} ${params}`;
      })
      .join('\n');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();

type JsonParseResult = { ok: true; value: unknown } | { ok: false };

function tryParseJson(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Extract and parse JSON content from model response
 * Handles cases where model returns markdown code blocks
 */
export function extractJsonFromResponse(content: string): unknown {
  const MAX_CONTENT_LENGTH = 100000;
  if (content.length > MAX_CONTENT_LENGTH) {
    throw new ExtractorResponseError(
      `Response content too large (${content.length} chars, max ${MAX_CONTENT_LENGTH}). Likely truncated/malformed.`
    );
  }

  const direct = tryParseJson(content);
  if (direct.ok) {
    return direct.value;
  }

  const jsonBlockMatch = content.match(/```json\s*([\s\S]*?)\s*```/);
  if (jsonBlockMatch) {
    const fenced = tryParseJson(jsonBlockMatch[1]);
    if (fenced.ok) {
      return fenced.value;
    }
  }

  throw new ExtractorResponseError('Could not extract valid JSON from response content');
}
