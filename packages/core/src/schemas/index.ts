export { SchemaValidationCache, formatSchemaErrors } from "./schema_cache";
export * from "./remote_schemas";
