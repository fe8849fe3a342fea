/**
 * Path Utilities
 *
 * Resolves the configuration directory and maps configuration names to files.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

import { CONFIG_EXTENSION, validateConfigName } from '../core/naming.js';

/**
 * Directory name used under the XDG config home.
 */
export const APP_DIR_NAME = 'qlaunch';

/**
 * Environment variable that overrides the configuration directory.
 */
export const CONFIG_DIR_ENV = 'QLAUNCH_CONFIG_DIR';

/**
 * Settings file kept alongside the configurations.
 */
export const SETTINGS_FILE_NAME = 'settings.yaml';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~ or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  if (expanded === '~' || expanded.startsWith('~/') || expanded.startsWith('~\\')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Options for locating the configuration directory
 */
export interface ConfigDirOptions {
  /** Explicit directory, e.g. from --config-dir */
  configDir?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
}

/**
 * Resolve the configuration directory.
 *
 * First match wins: explicit option, $QLAUNCH_CONFIG_DIR, $XDG_CONFIG_HOME/qlaunch,
 * ~/.config/qlaunch.
 */
export function resolveConfigDir(options: ConfigDirOptions = {}): string {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  if (options.configDir) {
    return expandPath(options.configDir, cwd);
  }

  const override = env[CONFIG_DIR_ENV];
  if (override) {
    return expandPath(override, cwd);
  }

  const xdgConfigHome = env['XDG_CONFIG_HOME'];
  if (xdgConfigHome) {
    return join(expandPath(xdgConfigHome, cwd), APP_DIR_NAME);
  }

  return join(homedir(), '.config', APP_DIR_NAME);
}

/**
 * Get the canonical file path for a configuration name.
 *
 * Does not create the directory.
 *
 * @throws InvalidNameError if the name would escape `configDir`
 */
export function getConfigFilePath(configDir: string, name: string): string {
  validateConfigName(name, configDir);
  return join(resolve(configDir), `${name}${CONFIG_EXTENSION}`);
}

/**
 * Get the settings file path for a configuration directory.
 */
export function getSettingsPath(configDir: string): string {
  return join(resolve(configDir), SETTINGS_FILE_NAME);
}
