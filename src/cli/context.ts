/**
 * Command Context
 *
 * Builds the collaborators every command needs from the global options,
 * and provides the shared exit/error handling.
 */

import { resolveSettings } from '../config/resolver.js';
import type { ResolvedSettings } from '../config/types.js';
import {
  SerializationError,
  SettingsError,
  getExitCode,
  isQlaunchError,
} from '../core/errors.js';
import { SpawnLauncher, createVersionProbe, type ProcessLauncher, type VersionProbe } from '../qemu/index.js';
import { ConfigStore } from '../store/store.js';
import { InquirerPrompter, type Prompter } from '../ui/prompter.js';
import type { OutputFormatter } from './output.js';

/**
 * Options accepted by every command
 */
export interface GlobalOptions {
  /** Configuration directory override */
  configDir?: string;
  /** Emit a single JSON object instead of human-readable lines */
  json?: boolean;
  /** Echo external commands to stderr before running them */
  verbose?: boolean;
}

/**
 * Everything a command handler works with
 */
export interface CommandContext {
  settings: ResolvedSettings;
  store: ConfigStore;
  prompter: Prompter;
  launcher: ProcessLauncher;
  probeVersion: VersionProbe;
}

/**
 * Resolve settings and construct the real collaborators.
 *
 * @throws SettingsError if settings.yaml is invalid
 */
export async function createContext(options: GlobalOptions): Promise<CommandContext> {
  const settings = await resolveSettings({ configDir: options.configDir });
  const verbose = options.verbose ?? false;

  return {
    settings,
    store: new ConfigStore(settings.configDir),
    // Never prompt while producing JSON
    prompter: new InquirerPrompter({ interactive: !options.json }),
    // QEMU's own stdout must not interleave with the JSON result
    launcher: new SpawnLauncher({ verbose, stdout: options.json ? 'stderr' : 'inherit' }),
    probeVersion: createVersionProbe({ verbose }),
  };
}

/**
 * Flush output and exit with the given code.
 */
export function finish(output: OutputFormatter, code: number = 0): never {
  output.flush();
  process.exit(code);
}

/**
 * Report an error and exit appropriately.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  if (isQlaunchError(error)) {
    output.error(error.message, error);
    if (error instanceof SerializationError || error instanceof SettingsError) {
      const details = (error.validationErrors ?? []).map((e) => `- ${e.path}: ${e.message}`);
      if (details.length > 0) {
        output.errorDetails(details);
      }
    }
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  finish(output, getExitCode(error));
}
