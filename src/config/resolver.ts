/**
 * Settings Resolver
 *
 * Locates the configuration directory, loads settings.yaml from it, and
 * applies defaults.
 */

import { SettingsError } from '../core/errors.js';
import { getSettingsPath, resolveConfigDir, type ConfigDirOptions } from '../lib/paths.js';
import { SettingsLoadError, readSettingsFile, type SettingsFile } from './loader.js';
import type { QlaunchSettings, ResolvedSettings } from './types.js';
import { validateSettings } from './validator.js';

/**
 * Default values when not specified in settings
 */
export const DEFAULTS = {
  gdbPort: 1234,
  versionCheck: true,
};

/**
 * Apply defaults to validated settings.
 */
export function applyDefaults(
  settings: QlaunchSettings,
  configDir: string
): ResolvedSettings {
  return {
    configDir,
    settingsPath: getSettingsPath(configDir),
    gdbPort: settings.gdb_port ?? DEFAULTS.gdbPort,
    versionCheck: settings.version_check ?? DEFAULTS.versionCheck,
  };
}

/**
 * Resolve the configuration directory and its settings.
 *
 * A missing settings file yields the defaults.
 *
 * @throws SettingsError if the settings file is unreadable, not YAML, or fails validation
 */
export async function resolveSettings(
  options: ConfigDirOptions = {}
): Promise<ResolvedSettings> {
  const configDir = resolveConfigDir(options);
  const settingsPath = getSettingsPath(configDir);

  let file: SettingsFile;
  try {
    file = await readSettingsFile(settingsPath);
  } catch (error) {
    if (error instanceof SettingsLoadError) {
      throw new SettingsError(error.message, settingsPath);
    }
    throw error;
  }

  if (!file.found) {
    return applyDefaults({}, configDir);
  }

  const result = validateSettings(file.data);
  if (!result.valid) {
    throw new SettingsError(
      `Invalid settings file ${settingsPath}`,
      settingsPath,
      result.errors.map(({ path, message }) => ({ path, message }))
    );
  }

  return applyDefaults(result.settings, configDir);
}
