/**
 * Rename Command Handler
 *
 * Moves a configuration to a new name, optionally replacing its description.
 */

import { toConfirmFn } from '../../ui/prompter.js';
import { createContext, finish, handleError, type GlobalOptions } from '../context.js';
import { createOutput } from '../output.js';

/**
 * Options for the rename command
 */
export interface RenameCommandOptions extends GlobalOptions {
  desc?: string;
  force?: boolean;
}

/**
 * Execute the rename command.
 *
 * Declining the overwrite prompt is a successful no-op.
 */
export async function renameCommand(
  oldName: string,
  newName: string,
  options: RenameCommandOptions
): Promise<void> {
  const output = createOutput('rename', options);

  try {
    const { store, prompter } = await createContext(options);
    const result = await store.rename(oldName, newName, {
      desc: options.desc,
      force: options.force,
      confirm: toConfirmFn(prompter),
    });

    if (result.status === 'cancelled') {
      output.info('Rename cancelled');
      output.setData('cancelled', true);
      finish(output, 0);
    }

    const desc = result.config.desc;
    output.success(
      desc !== undefined
        ? `Configuration '${oldName}' renamed to '${newName}' with description '${desc}'`
        : `Configuration '${oldName}' renamed to '${newName}'`
    );

    output.setData('from', oldName);
    output.setData('to', newName);
    output.setData('path', result.path);
    finish(output, 0);
  } catch (error) {
    handleError(output, error);
  }
}
