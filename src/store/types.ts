/**
 * Configuration Record Types
 *
 * These types represent one saved QEMU invocation as persisted in
 * <config_dir>/<name>.json.
 */

/**
 * Persisted configuration record.
 *
 * Field names are the on-disk keys. Optional fields are omitted from the file
 * when absent; an empty string is a present value.
 */
export interface QemuConfig {
  /** Path or command name of the QEMU binary */
  readonly qemu_bin: string;
  /** Arguments passed to the binary, in order */
  readonly args: readonly string[];
  /** Free-text description */
  readonly desc?: string;
  /** QEMU version detected when the configuration was saved */
  readonly qemu_version?: string;
}

/**
 * A configuration together with its identity on disk
 */
export interface StoredConfig {
  /** Configuration name (file stem) */
  name: string;
  /** Absolute path to the JSON file */
  path: string;
  /** Decoded record */
  config: QemuConfig;
}

/**
 * Asks the user a yes/no question; resolves true only for an explicit yes.
 */
export type ConfirmFn = (message: string) => Promise<boolean>;

/**
 * Options for ConfigStore.rename
 */
export interface RenameOptions {
  /** Replacement description; undefined keeps the existing one */
  desc?: string;
  /** Overwrite an existing target without asking */
  force?: boolean;
  /** Confirmation used when the target exists and force is not set */
  confirm: ConfirmFn;
}

/**
 * Outcome of a rename. Cancellation is a normal result, not an error.
 */
export type RenameResult =
  | { status: 'renamed'; config: QemuConfig; path: string }
  | { status: 'cancelled' };
