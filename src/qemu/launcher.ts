/**
 * QEMU Process Launcher
 *
 * Spawns the configured binary with the terminal attached and waits for it to exit.
 */

import { spawn, type StdioOptions } from 'node:child_process';

import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * How a launch ended.
 */
export type LaunchOutcome =
  | { kind: 'exited'; code: number }
  | { kind: 'signaled'; signal: NodeJS.Signals | null }
  | { kind: 'spawn-failed'; error: Error };

/**
 * Starts an external process and reports how it ended.
 */
export interface ProcessLauncher {
  launch(bin: string, args: readonly string[]): Promise<LaunchOutcome>;
}

/**
 * Where the child's stdout goes. `stderr` keeps qlaunch's own stdout free for
 * the --json result.
 */
export type ChildStdout = 'inherit' | 'stderr';

/**
 * stdio for the child: stdin and stderr are always inherited.
 */
export function launchStdio(stdout: ChildStdout): StdioOptions {
  return stdout === 'stderr' ? ['inherit', 2, 'inherit'] : 'inherit';
}

/**
 * Options for constructing a SpawnLauncher
 */
export interface SpawnLauncherOptions {
  /** Print the command line to stderr before launching (default: false) */
  verbose?: boolean;
  /** Destination of the child's stdout (default: inherit) */
  stdout?: ChildStdout;
  /** Signals forwarded to the child while it runs (default: SIGINT, SIGTERM) */
  forwardSignals?: NodeJS.Signals[];
}

/**
 * Launches processes with child_process.spawn.
 *
 * There is no timeout: the returned promise settles only when the child exits.
 * While it runs, the configured signals are relayed to the child instead of
 * terminating qlaunch, so the exit status can still be reported.
 */
export class SpawnLauncher implements ProcessLauncher {
  private readonly verbose: boolean;
  private readonly forwardSignals: NodeJS.Signals[];
  private readonly stdout: ChildStdout;

  constructor(options?: SpawnLauncherOptions) {
    this.verbose = options?.verbose ?? false;
    this.stdout = options?.stdout ?? 'inherit';
    this.forwardSignals = options?.forwardSignals ?? ['SIGINT', 'SIGTERM'];
  }

  launch(bin: string, args: readonly string[]): Promise<LaunchOutcome> {
    if (this.verbose) {
      process.stderr.write(formatCommand(bin, args, supportsAnsi()));
    }

    return new Promise<LaunchOutcome>((resolve) => {
      const child = spawn(bin, [...args], { stdio: launchStdio(this.stdout) });

      const relay = (signal: NodeJS.Signals): void => {
        child.kill(signal);
      };
      for (const signal of this.forwardSignals) {
        process.on(signal, relay);
      }
      const detach = (): void => {
        for (const signal of this.forwardSignals) {
          process.off(signal, relay);
        }
      };

      child.on('error', (error: Error) => {
        detach();
        resolve({ kind: 'spawn-failed', error });
      });

      child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        detach();
        if (code !== null) {
          resolve({ kind: 'exited', code });
        } else {
          resolve({ kind: 'signaled', signal });
        }
      });
    });
  }
}
