/**
 * Execution Engine
 *
 * Turns a named configuration into a running QEMU process:
 * load → version check → substitution → debug flags → banner → launch.
 * Nothing here is retried; a failed launch or non-zero exit is reported as is.
 */

import { ExecutionFailedError, IoError, NO_EXIT_CODE } from './errors.js';
import { findPlaceholders, lookupVar, substituteParams } from './substitute.js';
import type { ExecDeps, ExecOptions, ExecResult, OutputSink, VersionDrift } from './types.js';
import type { QemuConfig } from '../store/types.js';
import type { VersionProbe } from '../qemu/version.js';

/**
 * Port QEMU's `-s` shorthand starts the GDB stub on.
 */
export const DEFAULT_GDB_PORT = 1234;

/**
 * Arguments that start a GDB stub on `port` and freeze the CPU at startup.
 *
 * The default port uses QEMU's `-s` shorthand.
 */
export function debugArgs(port: number = DEFAULT_GDB_PORT): string[] {
  if (port === DEFAULT_GDB_PORT) {
    return ['-s', '-S'];
  }
  return ['-gdb', `tcp::${port}`, '-S'];
}

/**
 * Compare the saved QEMU version with the installed one.
 *
 * Never fails: detection problems only change the reported status.
 */
export async function checkVersionDrift(
  config: QemuConfig,
  probeVersion: VersionProbe
): Promise<VersionDrift> {
  const saved = config.qemu_version;
  if (saved === undefined) {
    return { status: 'unchecked' };
  }

  let current: string | undefined;
  try {
    current = await probeVersion(config.qemu_bin);
  } catch {
    current = undefined;
  }

  if (current === undefined) {
    return { status: 'undetected', saved };
  }
  if (current !== saved) {
    return { status: 'mismatch', saved, current };
  }
  return { status: 'match', version: current };
}

/**
 * Report a version drift result as warnings.
 */
export function reportVersionDrift(drift: VersionDrift, output: OutputSink): void {
  switch (drift.status) {
    case 'mismatch':
      output.warning(
        `Version mismatch: configuration saved with QEMU ${drift.saved}, current system has QEMU ${drift.current}. Some features might not work as expected.`
      );
      break;
    case 'undetected':
      output.warning('Could not detect current QEMU version.');
      break;
    case 'match':
    case 'unchecked':
      break;
  }
}

/**
 * Build the effective argument list: stored args after substitution, then debug flags.
 */
export function buildEffectiveArgs(
  config: QemuConfig,
  options: Pick<ExecOptions, 'debug' | 'gdbPort' | 'env'> = {}
): string[] {
  const args = substituteParams(config.args, options.env ?? process.env);
  if (options.debug) {
    args.push(...debugArgs(options.gdbPort));
  }
  return args;
}

/**
 * Print the startup banner.
 */
export function printStartupMessage(
  name: string,
  config: QemuConfig,
  args: readonly string[],
  options: Pick<ExecOptions, 'debug' | 'full' | 'gdbPort'>,
  output: OutputSink
): void {
  const header = config.desc !== undefined
    ? `Starting configuration '${name}' (${config.desc})`
    : `Starting configuration '${name}'`;
  output.info(header);

  if (options.full) {
    output.info(`  QEMU: ${config.qemu_bin}`);
    output.info(`  Args: ${JSON.stringify(args)}`);
  }

  if (options.debug) {
    const port = options.gdbPort ?? DEFAULT_GDB_PORT;
    output.info('  Mode: DEBUG');
    output.info(`  GDB server: localhost:${port}`);
    output.newline();
    output.info(`Connect with: gdb -ex 'target remote localhost:${port}'`);
  }
}

/**
 * Launch a saved configuration and wait for QEMU to exit.
 *
 * @param name - Configuration name
 * @param options - Runtime options
 * @param deps - Store, launcher, version probe and output sink
 * @returns Details of the launch when QEMU exits with status 0
 * @throws NotFoundError if the configuration does not exist
 * @throws IoError if the binary cannot be spawned
 * @throws ExecutionFailedError if QEMU exits non-zero or is killed by a signal
 */
export async function runConfiguration(
  name: string,
  options: ExecOptions,
  deps: ExecDeps
): Promise<ExecResult> {
  const { store, launcher, probeVersion, output } = deps;

  const config = await store.load(name);

  let drift: VersionDrift = { status: 'unchecked' };
  if (options.checkVersion ?? true) {
    drift = await checkVersionDrift(config, probeVersion);
    reportVersionDrift(drift, output);
  }

  const env = options.env ?? process.env;
  const args = buildEffectiveArgs(config, { ...options, env });

  for (const varName of findPlaceholders(config.args)) {
    if (lookupVar(env, varName) === undefined) {
      output.warning(`Environment variable ${varName} is not set; \${${varName}} is passed through unchanged.`);
    }
  }

  printStartupMessage(name, config, args, options, output);

  const outcome = await launcher.launch(config.qemu_bin, args);

  switch (outcome.kind) {
    case 'spawn-failed':
      throw new IoError(
        `Failed to execute QEMU: ${config.qemu_bin}`,
        config.qemu_bin,
        outcome.error,
        'Check that the binary exists and is executable, or re-save the configuration with the right path.'
      );
    case 'signaled':
      throw new ExecutionFailedError(NO_EXIT_CODE, outcome.signal ?? undefined);
    case 'exited':
      if (outcome.code !== 0) {
        throw new ExecutionFailedError(outcome.code);
      }
      return { name, qemuBin: config.qemu_bin, args, drift };
  }
}
