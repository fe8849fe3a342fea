/**
 * Remove Command Handler
 *
 * Permanently deletes a saved configuration.
 */

import { createContext, finish, handleError, type GlobalOptions } from '../context.js';
import { createOutput } from '../output.js';

/**
 * Execute the rm command.
 */
export async function rmCommand(name: string, options: GlobalOptions): Promise<void> {
  const output = createOutput('rm', options);

  try {
    const { store } = await createContext(options);
    await store.delete(name);

    output.success(`Configuration '${name}' deleted`);
    output.setData('name', name);
    finish(output, 0);
  } catch (error) {
    handleError(output, error);
  }
}
