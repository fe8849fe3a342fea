#!/usr/bin/env node
import { Argument, program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { saveCommand } from './commands/save.js';
import { renameCommand } from './commands/rename.js';
import { rmCommand } from './commands/rm.js';
import { listCommand } from './commands/list.js';
import { printCommand } from './commands/print.js';
import { execCommand } from './commands/exec.js';
import { SUPPORTED_SHELLS, completionsCommand, isSupportedShell } from './commands/completions.js';
import type { GlobalOptions } from './context.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

const BIN_NAME = 'qlaunch';

program
  .name(BIN_NAME)
  .description('A minimalist QEMU command-line manager: save a command line once, launch it by name')
  .version(packageJson.version)
  .enablePositionalOptions()
  .option('--config-dir <dir>', 'Configuration directory (default: $QLAUNCH_CONFIG_DIR or ~/.config/qlaunch)')
  .option('--json', 'Output as JSON (with exec, QEMU output goes to stderr)')
  .option('--verbose', 'Print QEMU commands before execution');

/**
 * Merge the global options into command-level options.
 * Supports --json in both positions:
 *   qlaunch --json list    (parent parses --json)
 *   qlaunch list --json    (subcommand parses --json)
 */
function withGlobalOpts<T extends GlobalOptions>(opts: T): T {
  const globalOpts = program.opts<GlobalOptions>();
  return {
    ...opts,
    configDir: opts.configDir ?? globalOpts.configDir,
    json: opts.json === true || globalOpts.json === true,
    verbose: opts.verbose === true || globalOpts.verbose === true,
  };
}

program
  .command('save')
  .description('Save a QEMU configuration (options go before <name>; everything after <qemu-bin> is passed to QEMU)')
  .argument('<name>', 'Configuration name')
  .argument('<qemu-bin>', 'QEMU binary, e.g. qemu-system-x86_64')
  .argument('[args...]', 'Arguments passed to QEMU (everything after <qemu-bin>)')
  .option('-d, --desc <text>', 'Description of the configuration')
  .option('-f, --force', 'Overwrite an existing configuration without confirmation')
  .option('--json', 'Output as JSON')
  .passThroughOptions()
  .action((name: string, qemuBin: string, args: string[], opts: { desc?: string; force?: boolean; json?: boolean }) =>
    saveCommand(name, qemuBin, args, withGlobalOpts(opts))
  );

program
  .command('rename <old-name> <new-name>')
  .description('Rename a saved configuration')
  .option('-d, --desc <text>', 'New description (default: keep the current one)')
  .option('-f, --force', 'Overwrite an existing target without confirmation')
  .option('--json', 'Output as JSON')
  .action((oldName: string, newName: string, opts: { desc?: string; force?: boolean; json?: boolean }) =>
    renameCommand(oldName, newName, withGlobalOpts(opts))
  );

program
  .command('rm <name>')
  .description('Remove a saved configuration')
  .option('--json', 'Output as JSON')
  .action((name: string, opts: { json?: boolean }) => rmCommand(name, withGlobalOpts(opts)));

program
  .command('list')
  .description('List all saved configurations')
  .option('--names', 'Print configuration names only, one per line')
  .option('--json', 'Output as JSON')
  .action((opts: { names?: boolean; json?: boolean }) => listCommand(withGlobalOpts(opts)));

program
  .command('print <name>')
  .description('Print details of a configuration')
  .option('--json', 'Output as JSON')
  .action((name: string, opts: { json?: boolean }) => printCommand(name, withGlobalOpts(opts)));

program
  .command('exec <name>')
  .description('Execute a saved configuration')
  .option('-d, --debug', 'Start the GDB stub and freeze the CPU at startup')
  .option('-f, --full', 'Show the QEMU binary and full argument list before starting')
  .option('--json', 'Output as JSON')
  .action((name: string, opts: { debug?: boolean; full?: boolean; json?: boolean }) =>
    execCommand(name, withGlobalOpts(opts))
  );

program
  .command('completions')
  .description('Generate shell completion scripts')
  .addArgument(new Argument('<shell>', 'Shell type').choices(SUPPORTED_SHELLS))
  .action((shell: string) => {
    if (isSupportedShell(shell)) {
      completionsCommand(shell, BIN_NAME, withGlobalOpts({}));
    }
  });

await program.parseAsync();
