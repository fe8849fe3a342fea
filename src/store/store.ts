/**
 * Configuration Store
 *
 * Owns the on-disk representation of saved configurations: one pretty-printed
 * JSON file per name inside the configuration directory.
 * Writes are atomic (write to temp, then rename). No locking is done; the store
 * assumes one process manipulates a directory at a time.
 */

import { mkdir, readFile, readdir, rename, rm, stat, unlink, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { IoError, NotFoundError, RenameIncompleteError } from '../core/errors.js';
import { configNameFromFile, isValidConfigName } from '../core/naming.js';
import { getConfigFilePath } from '../lib/paths.js';
import { parseConfig, serializeConfig } from './codec.js';
import type { QemuConfig, RenameOptions, RenameResult, StoredConfig } from './types.js';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * CRUD operations over a configuration directory.
 */
export class ConfigStore {
  private readonly configDir: string;

  constructor(configDir: string) {
    this.configDir = resolve(configDir);
  }

  /**
   * Get the configuration directory.
   */
  getConfigDir(): string {
    return this.configDir;
  }

  /**
   * Get the canonical file path for a name.
   *
   * @throws InvalidNameError
   */
  pathFor(name: string): string {
    return getConfigFilePath(this.configDir, name);
  }

  /**
   * Check whether the configuration directory exists.
   */
  async hasConfigDir(): Promise<boolean> {
    try {
      const info = await stat(this.configDir);
      return info.isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Check if a configuration is stored under this name.
   *
   * @throws InvalidNameError
   */
  async exists(name: string): Promise<boolean> {
    const path = this.pathFor(name);
    try {
      await stat(path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Write a configuration, replacing any existing one with the same name.
   *
   * Creates the configuration directory when missing.
   *
   * @returns Path of the written file
   * @throws SerializationError if the record is invalid
   * @throws IoError if the file cannot be written
   */
  async save(name: string, config: QemuConfig): Promise<string> {
    const path = this.pathFor(name);
    const content = serializeConfig(config);
    const tempPath = `${path}.tmp`;

    try {
      await mkdir(this.configDir, { recursive: true });
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true }).catch(() => {
        // Report the save failure, not the cleanup one
      });
      throw new IoError(`Failed to save configuration '${name}' to ${path}`, path, toError(error));
    }

    return path;
  }

  /**
   * Read and decode a configuration.
   *
   * @throws NotFoundError if nothing is stored under the name
   * @throws SerializationError if the file content is malformed
   * @throws IoError if the file cannot be read
   */
  async load(name: string): Promise<QemuConfig> {
    const path = this.pathFor(name);
    let content: string;

    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        throw new NotFoundError(name);
      }
      throw new IoError(`Failed to read configuration '${name}' from ${path}`, path, toError(error));
    }

    return parseConfig(content, path);
  }

  /**
   * Remove a configuration.
   *
   * @throws NotFoundError if nothing is stored under the name
   * @throws IoError if the file cannot be removed
   */
  async delete(name: string): Promise<void> {
    const path = this.pathFor(name);

    try {
      await unlink(path);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        throw new NotFoundError(
          name,
          `Configuration '${name}' does not exist, cannot delete`,
          'Run `qlaunch list` to see available configurations.'
        );
      }
      throw new IoError(`Failed to delete configuration '${name}'`, path, toError(error));
    }
  }

  /**
   * Move a configuration to a new name, optionally replacing its description.
   *
   * The new file is written before the old one is removed, so an interruption
   * leaves a duplicate rather than losing the configuration.
   *
   * @throws NotFoundError if `oldName` does not exist
   * @throws RenameIncompleteError if the new file was written but the old one could not be removed
   */
  async rename(oldName: string, newName: string, options: RenameOptions): Promise<RenameResult> {
    const oldPath = this.pathFor(oldName);
    this.pathFor(newName);

    if (!(await this.exists(oldName))) {
      throw new NotFoundError(
        oldName,
        `Configuration '${oldName}' does not exist, cannot rename`,
        'Run `qlaunch list` to see available configurations.'
      );
    }

    const sameName = oldName === newName;
    if (!sameName && !options.force && (await this.exists(newName))) {
      const confirmed = await options.confirm(
        `Configuration '${newName}' already exists, overwrite?`
      );
      if (!confirmed) {
        return { status: 'cancelled' };
      }
    }

    const current = await this.load(oldName);
    const updated: QemuConfig =
      options.desc !== undefined ? { ...current, desc: options.desc } : current;

    const newPath = await this.save(newName, updated);

    if (!sameName) {
      try {
        await unlink(oldPath);
      } catch (error) {
        throw new RenameIncompleteError(oldName, newName, oldPath, toError(error));
      }
    }

    return { status: 'renamed', config: updated, path: newPath };
  }

  /**
   * List every readable configuration, sorted by name.
   *
   * Files that cannot be read or decoded are skipped. A missing directory
   * yields an empty list.
   *
   * @throws IoError if the directory exists but cannot be listed
   */
  async enumerate(): Promise<StoredConfig[]> {
    let fileNames: string[];

    try {
      const entries = await readdir(this.configDir, { withFileTypes: true });
      fileNames = entries
        .filter((entry) => entry.isFile() || entry.isSymbolicLink())
        .map((entry) => entry.name);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return [];
      }
      throw new IoError('Failed to read configuration directory', this.configDir, toError(error));
    }

    const configs: StoredConfig[] = [];

    for (const fileName of fileNames) {
      const name = configNameFromFile(fileName);
      if (name === null || !isValidConfigName(name, this.configDir)) {
        continue;
      }

      try {
        const config = await this.load(name);
        configs.push({ name, path: this.pathFor(name), config });
      } catch {
        // Skip unreadable or malformed configuration files
        continue;
      }
    }

    return configs.sort((a, b) => a.name.localeCompare(b.name));
  }
}
