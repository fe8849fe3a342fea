/**
 * Core Types for qlaunch
 *
 * Types shared by the execution engine and the command handlers.
 */

import type { ProcessLauncher } from '../qemu/launcher.js';
import type { VersionProbe } from '../qemu/version.js';
import type { ConfigStore } from '../store/store.js';

/**
 * Where the engine reports human-readable progress.
 *
 * Implemented by the CLI output formatter; tests record the lines.
 */
export interface OutputSink {
  info(message: string): void;
  warning(message: string): void;
  newline(): void;
}

/**
 * Runtime options for launching a configuration
 */
export interface ExecOptions {
  /** Start the GDB stub and freeze the CPU at startup */
  debug?: boolean;
  /** Print the binary and effective arguments before launching */
  full?: boolean;
  /** Compare saved and installed QEMU versions (default: true) */
  checkVersion?: boolean;
  /** GDB stub port (default: 1234) */
  gdbPort?: number;
  /** Environment used for parameter substitution (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Collaborators the execution engine depends on
 */
export interface ExecDeps {
  store: ConfigStore;
  launcher: ProcessLauncher;
  probeVersion: VersionProbe;
  output: OutputSink;
}

/**
 * Result of comparing the saved QEMU version with the installed one
 */
export type VersionDrift =
  | { status: 'unchecked' }
  | { status: 'match'; version: string }
  | { status: 'mismatch'; saved: string; current: string }
  | { status: 'undetected'; saved: string };

/**
 * Result of a successful launch
 */
export interface ExecResult {
  /** Configuration name */
  name: string;
  /** Binary that was launched */
  qemuBin: string;
  /** Arguments after substitution and debug flag injection */
  args: string[];
  /** Outcome of the version check */
  drift: VersionDrift;
}
