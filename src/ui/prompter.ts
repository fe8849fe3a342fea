/**
 * Prompter
 *
 * Yes/no confirmation behind an interface so the store and commands can be
 * exercised without a terminal.
 */

import inquirer from 'inquirer';

/**
 * Options for a confirmation prompt
 */
export interface ConfirmOptions {
  /** The question to ask */
  message: string;
  /** Answer used when the user just presses enter, or when no terminal is attached */
  default?: boolean;
}

/**
 * Interface for user prompts
 */
export interface Prompter {
  /**
   * Ask for confirmation (yes/no). Resolves false unless the user answers yes.
   */
  confirm(options: ConfirmOptions): Promise<boolean>;
}

/**
 * Configuration for the inquirer prompter
 */
export interface InquirerPrompterConfig {
  /** Whether prompts may be shown at all */
  interactive: boolean;
}

/**
 * Inquirer-based implementation of the Prompter interface
 */
export class InquirerPrompter implements Prompter {
  private readonly config: InquirerPrompterConfig;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.config = {
      interactive: config.interactive ?? true,
    };
  }

  isInteractive(): boolean {
    return this.config.interactive && Boolean(process.stdin.isTTY) && Boolean(process.stdout.isTTY);
  }

  async confirm(options: ConfirmOptions): Promise<boolean> {
    const fallback = options.default ?? false;

    if (!this.isInteractive()) {
      return fallback;
    }

    try {
      const response = await inquirer.prompt<{ value: boolean }>([
        {
          type: 'confirm',
          name: 'value',
          message: options.message,
          default: fallback,
        },
      ]);
      return response.value === true;
    } catch (error) {
      if (isCancelledError(error)) {
        return false;
      }
      throw error;
    }
  }
}

/**
 * Check for Ctrl+C cancellation of an inquirer prompt.
 */
export function isCancelledError(error: unknown): boolean {
  if (error instanceof Error) {
    return (
      error.message.includes('User force closed') ||
      error.message.includes('cancelled') ||
      error.name === 'ExitPromptError'
    );
  }
  return false;
}

/**
 * Adapt a Prompter to the confirm callback the store expects (default: no).
 */
export function toConfirmFn(prompter: Prompter): (message: string) => Promise<boolean> {
  return (message: string) => prompter.confirm({ message, default: false });
}
