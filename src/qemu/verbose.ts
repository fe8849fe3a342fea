/**
 * Verbose Output Helpers
 *
 * Formats external command lines for --verbose CLI output.
 * Used by the launcher and the version probe to print commands to stderr
 * before they run.
 */

/**
 * Prefix for verbose command output lines.
 */
const PREFIX = '[qemu] ';

/**
 * ANSI SGR 90: bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0: reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Characters that can appear in an argument without shell quoting.
 */
const SAFE_ARG = /^[A-Za-z0-9_\-+=.,/:@%]+$/;

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Quote an argument for display in a POSIX shell.
 */
export function quoteArg(arg: string): string {
  if (SAFE_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a binary and its arguments as one copy-pasteable shell line.
 */
export function formatCommandLine(bin: string, args: readonly string[]): string {
  return [bin, ...args].map(quoteArg).join(' ');
}

/**
 * Format a command for verbose output.
 *
 * Produces a fenced block suitable for writing to stderr:
 * - Blank line before and after the command
 * - Line prefixed with `[qemu] `
 * - Optionally wrapped in ANSI gray (SGR 90) when `ansi` is true
 *
 * @param bin - Binary being invoked
 * @param args - Arguments passed to it
 * @param ansi - Whether to wrap output in ANSI gray escape codes
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(bin: string, args: readonly string[], ansi: boolean): string {
  const plain = `\n${PREFIX}${formatCommandLine(bin, args)}\n\n`;

  if (ansi) {
    return `${ANSI_GRAY}${plain}${ANSI_RESET}`;
  }

  return plain;
}
