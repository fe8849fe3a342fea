/**
 * Save Command Handler
 *
 * Stores a QEMU binary and argument list under a name, recording the QEMU
 * version found at save time.
 */

import { InvalidBinaryError } from '../../core/errors.js';
import type { VersionProbe } from '../../qemu/version.js';
import type { ConfigStore } from '../../store/store.js';
import type { ConfirmFn, QemuConfig } from '../../store/types.js';
import { toConfirmFn } from '../../ui/prompter.js';
import { createContext, finish, handleError, type GlobalOptions } from '../context.js';
import { createOutput } from '../output.js';

/**
 * Options for the save command
 */
export interface SaveCommandOptions extends GlobalOptions {
  desc?: string;
  force?: boolean;
}

/**
 * What to save
 */
export interface SaveInput {
  name: string;
  qemuBin: string;
  args: string[];
  desc?: string;
  force?: boolean;
}

/**
 * Outcome of saving a configuration
 */
export type SaveResult =
  | { status: 'saved'; path: string; config: QemuConfig; overwritten: boolean }
  | { status: 'cancelled' };

/**
 * Save a configuration, asking before an existing one is replaced.
 *
 * @throws InvalidBinaryError if `qemuBin` starts with `-` (options placed after the name)
 * @throws InvalidNameError, SerializationError, IoError
 */
export async function saveConfiguration(
  input: SaveInput,
  deps: { store: ConfigStore; probeVersion: VersionProbe; confirm: ConfirmFn }
): Promise<SaveResult> {
  const { store, probeVersion, confirm } = deps;

  if (input.qemuBin.startsWith('-')) {
    throw new InvalidBinaryError(input.qemuBin);
  }

  const exists = await store.exists(input.name);
  if (exists && !input.force) {
    const confirmed = await confirm(`Configuration '${input.name}' already exists, overwrite?`);
    if (!confirmed) {
      return { status: 'cancelled' };
    }
  }

  const version = await probeVersion(input.qemuBin);

  const config: QemuConfig = {
    qemu_bin: input.qemuBin,
    args: [...input.args],
    ...(input.desc !== undefined && { desc: input.desc }),
    ...(version !== undefined && { qemu_version: version }),
  };

  const path = await store.save(input.name, config);
  return { status: 'saved', path, config, overwritten: exists };
}

/**
 * Execute the save command.
 */
export async function saveCommand(
  name: string,
  qemuBin: string,
  args: string[],
  options: SaveCommandOptions
): Promise<void> {
  const output = createOutput('save', options);

  try {
    const context = await createContext(options);
    const result = await saveConfiguration(
      { name, qemuBin, args, desc: options.desc, force: options.force },
      {
        store: context.store,
        probeVersion: context.probeVersion,
        confirm: toConfirmFn(context.prompter),
      }
    );

    if (result.status === 'cancelled') {
      output.info('Save cancelled');
      output.setData('cancelled', true);
      finish(output, 0);
    }

    if (result.config.qemu_version === undefined) {
      output.warning(`Could not detect the version of ${qemuBin}; version checks are disabled for '${name}'.`);
    }

    output.success(
      result.overwritten
        ? `Configuration '${name}' overwritten`
        : `Configuration '${name}' saved`
    );
    output.indent();
    output.info(`File: ${result.path}`);
    if (result.config.qemu_version !== undefined) {
      output.info(`QEMU version: ${result.config.qemu_version}`);
    }
    output.dedent();

    output.setData('name', name);
    output.setData('path', result.path);
    output.setData('config', result.config);
    finish(output, 0);
  } catch (error) {
    handleError(output, error);
  }
}
