/**
 * Settings Validator
 *
 * Checks parsed settings.yaml content against a JSON Schema with Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import type { QlaunchSettings } from './types.js';

/**
 * One schema violation
 */
export interface ValidationError {
  /** JSON pointer to the offending key, `/` for the document itself */
  path: string;
  message: string;
  /** Ajv keyword parameters, e.g. `additionalProperty` for unknown keys */
  params: Record<string, unknown>;
}

export type ValidationResult =
  | { valid: true; settings: QlaunchSettings }
  | { valid: false; errors: ValidationError[] };

/**
 * Schema for settings.yaml. Unknown keys are rejected so that typos surface.
 */
export const settingsSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    gdb_port: { type: 'integer', minimum: 1, maximum: 65535 },
    version_check: { type: 'boolean' },
  },
};

const ajv = new Ajv.default({ allErrors: true });
const validate = ajv.compile<QlaunchSettings>(settingsSchema);

function toValidationError(error: ErrorObject): ValidationError {
  return {
    path: error.instancePath || '/',
    message: error.message ?? 'Unknown validation error',
    params: { ...error.params },
  };
}

/**
 * Validate parsed settings.
 *
 * An empty document (null or undefined) counts as an empty mapping.
 */
export function validateSettings(data: unknown): ValidationResult {
  const candidate = data ?? {};

  if (validate(candidate)) {
    return { valid: true, settings: candidate };
  }
  return { valid: false, errors: (validate.errors ?? []).map(toValidationError) };
}
