/**
 * Settings Loader
 *
 * Reads settings.yaml from the configuration directory. The file is optional,
 * so a missing file is a normal result rather than an error.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

/**
 * Why a settings file could not be loaded
 */
export type SettingsLoadFailure = 'permission' | 'unreadable' | 'syntax';

/**
 * Error thrown when a settings file exists but cannot be used
 */
export class SettingsLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly failure: SettingsLoadFailure,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'SettingsLoadError';
  }
}

/**
 * Result of reading a settings file
 */
export type SettingsFile =
  | { found: false }
  | { found: true; data: unknown };

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Read and parse a YAML settings file.
 *
 * @returns `{ found: false }` when the file does not exist, otherwise the parsed
 *   document (unvalidated; an empty file parses to undefined)
 * @throws SettingsLoadError if the file cannot be read or is not valid YAML
 */
export async function readSettingsFile(filePath: string): Promise<SettingsFile> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = errnoCode(error);
    const cause = error instanceof Error ? error : undefined;
    if (code === 'ENOENT') {
      return { found: false };
    }
    if (code === 'EACCES') {
      throw new SettingsLoadError(`Permission denied reading settings file: ${filePath}`, filePath, 'permission', cause);
    }
    throw new SettingsLoadError(`Failed to read settings file: ${filePath}`, filePath, 'unreadable', cause);
  }

  try {
    return { found: true, data: yaml.load(content) };
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.reason : String(error);
    throw new SettingsLoadError(
      `Invalid YAML syntax in ${filePath}: ${reason}`,
      filePath,
      'syntax',
      error instanceof Error ? error : undefined
    );
  }
}
