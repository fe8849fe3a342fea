/**
 * List Command Handler
 *
 * Shows every saved configuration. Malformed files are skipped.
 */

import type { StoredConfig } from '../../store/types.js';
import { createContext, finish, handleError, type GlobalOptions } from '../context.js';
import { createOutput, type OutputFormatter } from '../output.js';

/**
 * Options for the list command
 */
export interface ListCommandOptions extends GlobalOptions {
  /** Print bare names, one per line (used by shell completion) */
  names?: boolean;
}

/**
 * Print the configuration list in human-readable form.
 */
export function printConfigList(output: OutputFormatter, configs: StoredConfig[]): void {
  output.info('Saved configurations:');
  output.indent();
  for (const { name, config } of configs) {
    output.info(`${name} - ${config.desc ?? '(no description)'}`);
    output.indent();
    output.info(`QEMU: ${config.qemu_bin}`);
    output.info(`Args: ${JSON.stringify(config.args)}`);
    output.dedent();
    output.newline();
  }
  output.dedent();
}

/**
 * Execute the list command.
 */
export async function listCommand(options: ListCommandOptions): Promise<void> {
  const output = createOutput('list', options);

  try {
    const { store } = await createContext(options);
    const configs = await store.enumerate();

    output.setData(
      'configurations',
      configs.map(({ name, path, config }) => ({ name, path, ...config }))
    );

    if (options.names) {
      for (const { name } of configs) {
        output.raw(name);
      }
      finish(output, 0);
    }

    if (configs.length > 0) {
      printConfigList(output, configs);
    } else if (await store.hasConfigDir()) {
      output.info('No configurations found.');
    } else {
      output.info('No configurations saved yet.');
    }

    finish(output, 0);
  } catch (error) {
    handleError(output, error);
  }
}
