/**
 * Print Command Handler
 *
 * Shows the full details of one configuration.
 */

import { NotFoundError } from '../../core/errors.js';
import { findPlaceholders } from '../../core/substitute.js';
import { formatCommandLine } from '../../qemu/verbose.js';
import type { StoredConfig } from '../../store/types.js';
import { createContext, finish, handleError, type GlobalOptions } from '../context.js';
import { createOutput, type OutputFormatter } from '../output.js';

const RULE = '='.repeat(60);

/**
 * Print configuration details in human-readable form.
 */
export function printConfigDetails(output: OutputFormatter, stored: StoredConfig): void {
  const { name, path, config } = stored;

  output.info(`Configuration: ${name}`);
  output.info(RULE);
  output.newline();

  if (config.desc !== undefined) {
    output.info('Description:');
    output.info(`  ${config.desc}`);
    output.newline();
  }

  output.info('QEMU Binary:');
  output.info(`  ${config.qemu_bin}`);
  output.newline();

  output.info('QEMU Version:');
  output.info(`  ${config.qemu_version ?? '(unknown)'}`);
  output.newline();

  output.info('Startup Arguments:');
  if (config.args.length === 0) {
    output.info('  (no arguments)');
  } else {
    config.args.forEach((arg, i) => output.info(`  [${i}] ${arg}`));
  }
  output.newline();

  const params = findPlaceholders(config.args);
  if (params.length > 0) {
    output.info('Parameters:');
    output.info(`  ${params.join(', ')}`);
    output.newline();
  }

  output.info('Full Command:');
  output.info(`  ${formatCommandLine(config.qemu_bin, config.args)}`);
  output.newline();

  output.info('Configuration File:');
  output.info(`  ${path}`);
}

/**
 * Execute the print command.
 */
export async function printCommand(name: string, options: GlobalOptions): Promise<void> {
  const output = createOutput('print', options);

  try {
    const { store } = await createContext(options);
    if (!(await store.exists(name))) {
      throw new NotFoundError(
        name,
        `Configuration '${name}' does not exist`,
        'Run `qlaunch list` to see available configurations.'
      );
    }
    const config = await store.load(name);
    const stored: StoredConfig = { name, path: store.pathFor(name), config };

    printConfigDetails(output, stored);

    output.setData('name', name);
    output.setData('path', stored.path);
    output.setData('config', config);
    finish(output, 0);
  } catch (error) {
    handleError(output, error);
  }
}
