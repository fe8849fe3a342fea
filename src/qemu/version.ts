/**
 * QEMU Version Probe
 *
 * Runs `<qemu-bin> --version` and extracts the version string. Any failure
 * yields undefined; the probe never throws.
 */

import { spawn } from 'node:child_process';

import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Determines the version reported by a QEMU binary.
 */
export type VersionProbe = (qemuBin: string) => Promise<string | undefined>;

/**
 * Options for probing a version
 */
export interface ProbeOptions {
  /** Timeout in milliseconds (default: 10000) */
  timeout?: number;
  /** Print the command to stderr before running it (default: false) */
  verbose?: boolean;
}

/**
 * Matches "QEMU emulator version 8.2.1 (...)" and similar banners.
 */
const VERSION_PATTERN = /version\s+(\d+(?:\.\d+)+)/i;

/**
 * Extract a version string from `--version` output.
 *
 * Falls back to the first non-empty line when no dotted version number is found.
 *
 * @returns The version, or undefined for empty output
 */
export function parseQemuVersion(output: string): string | undefined {
  const match = VERSION_PATTERN.exec(output);
  if (match?.[1]) {
    return match[1];
  }

  const firstLine = output
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  return firstLine;
}

/**
 * Run `<qemuBin> --version` and parse its output.
 */
export function probeQemuVersion(
  qemuBin: string,
  options: ProbeOptions = {}
): Promise<string | undefined> {
  const { timeout = 10000, verbose = false } = options;
  const args = ['--version'];

  if (verbose) {
    process.stderr.write(formatCommand(qemuBin, args, supportsAnsi()));
  }

  return new Promise<string | undefined>((resolve) => {
    let stdout = '';
    let settled = false;

    const finish = (version: string | undefined): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      resolve(version);
    };

    const child = spawn(qemuBin, args, { stdio: ['ignore', 'pipe', 'ignore'] });

    const timeoutId = setTimeout(() => {
      child.kill('SIGTERM');
      finish(undefined);
    }, timeout);

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.on('error', () => {
      finish(undefined);
    });

    child.on('close', (code: number | null) => {
      finish(code === 0 ? parseQemuVersion(stdout) : undefined);
    });
  });
}

/**
 * Create a VersionProbe bound to probe options.
 */
export function createVersionProbe(options: ProbeOptions = {}): VersionProbe {
  return (qemuBin: string) => probeQemuVersion(qemuBin, options);
}
