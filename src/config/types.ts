/**
 * Settings Types for qlaunch
 *
 * These types represent the optional settings.yaml kept in the configuration
 * directory, and the resolved settings with defaults applied.
 */

/**
 * Root object parsed from settings.yaml
 */
export interface QlaunchSettings {
  /** Port for the GDB stub started by `exec --debug`. Default: 1234 */
  gdb_port?: number;
  /** Compare the saved QEMU version with the installed one before launching. Default: true */
  version_check?: boolean;
}

/**
 * Settings with all defaults applied
 */
export interface ResolvedSettings {
  /** Absolute path to the configuration directory */
  configDir: string;
  /** Absolute path to the settings file (which may not exist) */
  settingsPath: string;
  /** GDB stub port */
  gdbPort: number;
  /** Whether the version drift check runs */
  versionCheck: boolean;
}
