/**
 * QEMU Module
 *
 * Exports the process launcher, version probe, and verbose helpers.
 */

export * from './launcher.js';
export * from './version.js';
export * from './verbose.js';
