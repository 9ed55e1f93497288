/**
 * Ajv validation instance with schema validators.
 * Schemas only check document structure; value semantics live with the callers.
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import { getSamplingConfigSchema } from './schema_loader';
import type { SamplingConfigDocument } from '@/types/sampling';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Lazy-loaded validators
let samplingConfigValidator: ValidateFunction<SamplingConfigDocument> | null = null;

export function getSamplingConfigValidator(): ValidateFunction<SamplingConfigDocument> {
  if (!samplingConfigValidator) {
    samplingConfigValidator = ajv.compile<SamplingConfigDocument>(getSamplingConfigSchema());
  }
  return samplingConfigValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

export function validateSamplingConfigDocument(
  data: unknown
): ValidationResult<SamplingConfigDocument> {
  const validate = getSamplingConfigValidator();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}
