/**
 * Configuration Record Codec
 *
 * Encodes records as pretty-printed JSON and decodes them with schema
 * validation using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';

import { SerializationError } from '../core/errors.js';
import type { QemuConfig } from './types.js';

/**
 * JSON schema for a stored record. Extra properties are tolerated and dropped on decode.
 */
const qemuConfigSchema = {
  type: 'object',
  required: ['qemu_bin', 'args'],
  properties: {
    qemu_bin: { type: 'string', minLength: 1 },
    args: { type: 'array', items: { type: 'string' } },
    desc: { type: 'string' },
    qemu_version: { type: 'string' },
  },
};

const ajv = new Ajv.default({
  allErrors: true,
});

// Compile the schema once
const validate = ajv.compile<QemuConfig>(qemuConfigSchema);

function toValidationErrors(
  errors: ErrorObject[] | null | undefined
): Array<{ path: string; message: string }> {
  return (errors ?? []).map((error) => ({
    path: error.instancePath || '/',
    message: error.message ?? 'Unknown validation error',
  }));
}

/**
 * Copy only the known fields, leaving absent optionals absent.
 */
function pickConfig(data: QemuConfig): QemuConfig {
  return {
    qemu_bin: data.qemu_bin,
    args: [...data.args],
    ...(data.desc !== undefined && { desc: data.desc }),
    ...(data.qemu_version !== undefined && { qemu_version: data.qemu_version }),
  };
}

/**
 * Decode and validate an arbitrary value as a configuration record.
 *
 * @param data - Parsed JSON value
 * @param path - File the value came from, for error messages
 * @throws SerializationError if the value does not match the record schema
 */
export function decodeConfig(data: unknown, path?: string): QemuConfig {
  if (!validate(data)) {
    throw new SerializationError(
      path ? `Invalid configuration file ${path}` : 'Invalid configuration',
      path,
      toValidationErrors(validate.errors)
    );
  }
  return pickConfig(data);
}

/**
 * Parse the text of a configuration file.
 *
 * @throws SerializationError on malformed JSON or schema violations
 */
export function parseConfig(content: string, path?: string): QemuConfig {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SerializationError(
      path ? `Failed to deserialize configuration ${path}: ${reason}` : `Failed to deserialize configuration: ${reason}`,
      path
    );
  }
  return decodeConfig(data, path);
}

/**
 * Encode a record as the text of a configuration file.
 *
 * @throws SerializationError if the record is not a valid configuration
 */
export function serializeConfig(config: QemuConfig): string {
  if (!validate(config)) {
    throw new SerializationError(
      'Failed to serialize configuration',
      undefined,
      toValidationErrors(validate.errors)
    );
  }
  return `${JSON.stringify(pickConfig(config), null, 2)}\n`;
}
