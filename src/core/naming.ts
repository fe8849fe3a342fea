/**
 * Configuration Name Validation
 *
 * A configuration name doubles as the file stem of its JSON file, so it
 * must stay a single path segment inside the configuration directory.
 */

import { dirname, join, resolve } from 'node:path';

import { InvalidNameError } from './errors.js';

/**
 * File extension for stored configurations.
 */
export const CONFIG_EXTENSION = '.json';

/**
 * Characters that would split a name into several path segments.
 */
const FORBIDDEN_CHARS = /[/\\\0]/;

/**
 * Validate a configuration name against a configuration directory.
 *
 * @param name - Caller-supplied configuration name
 * @param configDir - Directory the configuration file must live in
 * @throws InvalidNameError if the name would not map to a file directly inside `configDir`
 */
export function validateConfigName(name: string, configDir: string): void {
  if (name.length === 0) {
    throw new InvalidNameError(name, 'name must not be empty');
  }

  if (name === '.' || name === '..') {
    throw new InvalidNameError(name, 'name must not be a relative directory reference');
  }

  if (FORBIDDEN_CHARS.test(name)) {
    throw new InvalidNameError(name, 'name must not contain path separators');
  }

  const dir = resolve(configDir);
  const file = resolve(join(dir, `${name}${CONFIG_EXTENSION}`));
  if (dirname(file) !== dir) {
    throw new InvalidNameError(name, 'name resolves outside the configuration directory');
  }
}

/**
 * Check a name without throwing.
 */
export function isValidConfigName(name: string, configDir: string): boolean {
  try {
    validateConfigName(name, configDir);
    return true;
  } catch {
    return false;
  }
}

/**
 * Extract the configuration name from a directory entry, if it is a configuration file.
 *
 * @param fileName - Bare file name from a directory listing
 * @returns The name, or null for files that are not configurations
 */
export function configNameFromFile(fileName: string): string | null {
  if (!fileName.endsWith(CONFIG_EXTENSION)) {
    return null;
  }
  const name = fileName.slice(0, -CONFIG_EXTENSION.length);
  return name.length > 0 ? name : null;
}
