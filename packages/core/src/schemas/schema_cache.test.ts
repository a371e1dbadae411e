import { SchemaValidationCache, formatSchemaErrors } from './schema_cache';
import {
  ContactElementSchema,
  ExportProgressEnvelopeSchema,
  QualtricsPageEnvelopeSchema,
} from './remote_schemas';
import type { ContactElement, QualtricsPageEnvelope } from './remote_schemas';

describe('SchemaValidationCache', () => {

  beforeEach(() => {
    SchemaValidationCache.clearCache();
  });

  afterEach(() => {
    SchemaValidationCache.clearCache();
  });

  it('[EARS-1] should cache validators and avoid recompilation', () => {
    const validator1 = SchemaValidationCache.getValidatorFromSchema(QualtricsPageEnvelopeSchema);
    expect(typeof validator1).toBe('function');

    const validator2 = SchemaValidationCache.getValidatorFromSchema(QualtricsPageEnvelopeSchema);
    expect(validator2).toBe(validator1);
  });

  it('[EARS-2] should handle multiple different schemas', () => {
    const pageValidator = SchemaValidationCache.getValidatorFromSchema(QualtricsPageEnvelopeSchema);
    const progressValidator = SchemaValidationCache.getValidatorFromSchema(ExportProgressEnvelopeSchema);

    expect(pageValidator).not.toBe(progressValidator);
    expect(SchemaValidationCache.getCacheStats().cachedSchemas).toBe(2);
  });

  it('[EARS-3] should validate a page envelope with or without a next page pointer', () => {
    const validator = SchemaValidationCache.getValidatorFromSchema<QualtricsPageEnvelope>(QualtricsPageEnvelopeSchema);

    expect(validator({ result: { elements: [], nextPage: null } })).toBe(true);
    expect(validator({ result: { elements: [{ a: 1 }], nextPage: 'https://next' } })).toBe(true);
    expect(validator({ result: { elements: [] } })).toBe(true);
    expect(validator({ result: { nextPage: null } })).toBe(false);
    expect(validator({ elements: [] })).toBe(false);
  });

  it('[EARS-4] should accept contacts with a null or missing external reference', () => {
    const validator = SchemaValidationCache.getValidatorFromSchema<ContactElement>(ContactElementSchema);

    expect(validator({ contactId: 'CID_1', extRef: 'uid1' })).toBe(true);
    expect(validator({ contactId: 'CID_2', extRef: null })).toBe(true);
    expect(validator({ contactId: 'CID_3' })).toBe(true);
    expect(validator({ extRef: 'uid1' })).toBe(false);
  });

  it('[EARS-5] should format AJV errors as path/message pairs', () => {
    const validator = SchemaValidationCache.getValidatorFromSchema(ContactElementSchema);

    validator({ contactId: 42 });

    expect(formatSchemaErrors(validator.errors)).toEqual(['/contactId: must be string']);
    expect(formatSchemaErrors(null)).toEqual([]);
  });
});
