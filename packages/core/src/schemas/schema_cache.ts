import Ajv from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

/**
 * Singleton cache for schema validators to avoid repeated AJV compilation.
 * Validators are keyed by the serialized schema.
 */
export class SchemaValidationCache {
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for a schema object.
   * @param schema The schema object (already parsed YAML/JSON)
   * @returns Compiled AJV validator function
   */
  static getValidatorFromSchema<T = unknown>(schema: SchemaObject): ValidateFunction<T> {
    const schemaKey = JSON.stringify(schema);

    const cached = this.schemaValidators.get(schemaKey);
    if (cached) {
      return cached as ValidateFunction<T>;
    }

    const validator = this.getAjv().compile<T>(schema);
    this.schemaValidators.set(schemaKey, validator);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.schemaValidators.clear();
    this.ajv = null;
  }

  /**
   * Gets cache statistics for monitoring.
   */
  static getCacheStats(): { cachedSchemas: number } {
    return {
      cachedSchemas: this.schemaValidators.size,
    };
  }
}

/**
 * Renders AJV errors as `path: message` strings.
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return [];
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'is invalid'}`);
}
