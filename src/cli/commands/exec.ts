/**
 * Exec Command Handler
 *
 * Launches a saved configuration and waits for QEMU to exit. The QEMU exit
 * code becomes qlaunch's exit code when QEMU fails.
 */

import { runConfiguration } from '../../core/runner.js';
import { createContext, finish, handleError, type GlobalOptions } from '../context.js';
import { createOutput } from '../output.js';

/**
 * Options for the exec command
 */
export interface ExecCommandOptions extends GlobalOptions {
  /** Append the GDB stub and freeze-at-startup flags */
  debug?: boolean;
  /** Show the binary and full argument list before starting */
  full?: boolean;
}

/**
 * Execute the exec command.
 */
export async function execCommand(name: string, options: ExecCommandOptions): Promise<void> {
  const output = createOutput('exec', options);

  try {
    const context = await createContext(options);
    const result = await runConfiguration(
      name,
      {
        debug: options.debug,
        full: options.full,
        checkVersion: context.settings.versionCheck,
        gdbPort: context.settings.gdbPort,
      },
      {
        store: context.store,
        launcher: context.launcher,
        probeVersion: context.probeVersion,
        output,
      }
    );

    output.setData('name', result.name);
    output.setData('qemu_bin', result.qemuBin);
    output.setData('args', result.args);
    output.setData('version', result.drift);
    finish(output, 0);
  } catch (error) {
    handleError(output, error);
  }
}
