/**
 * Completions Command Handler
 *
 * Prints shell completion scripts. Configuration names are completed
 * dynamically from `qlaunch list --names`, in the directory given by any
 * `--config-dir` already on the command line.
 */

import { createOutput } from '../output.js';
import { finish, handleError, type GlobalOptions } from '../context.js';

/**
 * Shells a completion script can be generated for
 */
export const SUPPORTED_SHELLS = ['bash', 'zsh', 'fish'] as const;

export type Shell = (typeof SUPPORTED_SHELLS)[number];

/**
 * Completion metadata for one subcommand
 */
export interface SubcommandSpec {
  name: string;
  description: string;
  options: string[];
  /** Whether the first positional argument is a configuration name */
  completesConfigName: boolean;
}

const GLOBAL_OPTIONS = ['--json', '--verbose', '--config-dir', '--help'];

export const SUBCOMMANDS: SubcommandSpec[] = [
  { name: 'save', description: 'Save a QEMU configuration', options: ['-d', '--desc', '-f', '--force'], completesConfigName: false },
  { name: 'rename', description: 'Rename a saved configuration', options: ['-d', '--desc', '-f', '--force'], completesConfigName: true },
  { name: 'rm', description: 'Remove a saved configuration', options: [], completesConfigName: true },
  { name: 'list', description: 'List all saved configurations', options: ['--names'], completesConfigName: false },
  { name: 'print', description: 'Print details of a configuration', options: [], completesConfigName: true },
  { name: 'exec', description: 'Execute a saved configuration', options: ['-d', '--debug', '-f', '--full'], completesConfigName: true },
  { name: 'completions', description: 'Generate shell completion scripts', options: [], completesConfigName: false },
];

/**
 * Check whether a string names a supported shell.
 */
export function isSupportedShell(value: string): value is Shell {
  return (SUPPORTED_SHELLS as readonly string[]).includes(value);
}

function configCommands(): string[] {
  return SUBCOMMANDS.filter((c) => c.completesConfigName).map((c) => c.name);
}

/**
 * Bash completion script.
 *
 * The subcommand is the first word that is not an option; a `--config-dir`
 * typed before it is handed on to `list --names`.
 */
export function bashCompletion(bin: string): string {
  const fn = `_${bin.replace(/[^A-Za-z0-9_]/g, '_')}`;
  const optionCases = SUBCOMMANDS.map(
    (c) => `        ${c.name}) opts="${[...c.options, ...GLOBAL_OPTIONS].join(' ')}" ;;`
  ).join('\n');

  return `# bash completion for ${bin}
${fn}_configs() {
    if [[ -n "$1" ]]; then
        ${bin} --config-dir "$1" list --names 2>/dev/null
    else
        ${bin} list --names 2>/dev/null
    fi
}

${fn}() {
    local cur word i opts subcmd="" subcmd_index=0 config_dir=""
    COMPREPLY=()
    cur="\${COMP_WORDS[COMP_CWORD]}"

    for (( i=1; i < COMP_CWORD; i++ )); do
        word="\${COMP_WORDS[i]}"
        if [[ -n "\${subcmd}" ]]; then
            break
        elif [[ "\${word}" == --config-dir ]]; then
            config_dir="\${COMP_WORDS[i+1]}"
            (( i++ ))
        elif [[ "\${word}" == --config-dir=* ]]; then
            config_dir="\${word#--config-dir=}"
        elif [[ "\${word}" != -* ]]; then
            subcmd="\${word}"
            subcmd_index=\${i}
        fi
    done

    if [[ -z "\${subcmd}" ]]; then
        COMPREPLY=( $(compgen -W "${SUBCOMMANDS.map((c) => c.name).join(' ')} ${GLOBAL_OPTIONS.join(' ')}" -- "\${cur}") )
        return 0
    fi

    if [[ "\${cur}" == -* ]]; then
        case "\${subcmd}" in
${optionCases}
        *) opts="${GLOBAL_OPTIONS.join(' ')}" ;;
        esac
        COMPREPLY=( $(compgen -W "\${opts}" -- "\${cur}") )
        return 0
    fi

    case "\${subcmd}" in
        ${configCommands().join('|')})
            if [[ \${COMP_CWORD} -eq \$(( subcmd_index + 1 )) ]]; then
                COMPREPLY=( $(compgen -W "$(${fn}_configs "\${config_dir}")" -- "\${cur}") )
            fi
            ;;
        completions)
            COMPREPLY=( $(compgen -W "${SUPPORTED_SHELLS.join(' ')}" -- "\${cur}") )
            ;;
    esac
    return 0
}

complete -F ${fn} ${bin}
`;
}

/**
 * Zsh completion script.
 */
export function zshCompletion(bin: string): string {
  const values = SUBCOMMANDS.map((c) => `                "${c.name}[${c.description}]"`).join(' \\\n');

  return `#compdef ${bin}

_${bin}_configs() {
    local -a configs cmd
    cmd=(${bin})
    if [[ -n "\${opt_args[--config-dir]}" ]]; then
        cmd+=(--config-dir "\${opt_args[--config-dir]}")
    fi
    configs=(\${(f)"$("\${cmd[@]}" list --names 2>/dev/null)"})
    _describe 'configurations' configs
}

_${bin}() {
    local line state
    local -A opt_args

    _arguments -C \\
        "--config-dir[Configuration directory]:directory:_files -/" \\
        "--json[Output as JSON]" \\
        "--verbose[Print QEMU commands before execution]" \\
        "1: :->cmds" \\
        "*::arg:->args"

    case "$state" in
        cmds)
            _values "${bin} command" \\
${values}
            ;;
        args)
            case $line[1] in
                ${configCommands().join('|')})
                    if [[ $CURRENT -eq 2 ]]; then
                        _${bin}_configs
                    fi
                    ;;
                completions)
                    _values "shell" ${SUPPORTED_SHELLS.join(' ')}
                    ;;
            esac
            ;;
    esac
}

compdef _${bin} ${bin}
`;
}

/**
 * Fish completion script.
 */
export function fishCompletion(bin: string): string {
  const names = SUBCOMMANDS.map((c) => c.name).join(' ');
  const subcommandLines = SUBCOMMANDS.map(
    (c) => `complete -c ${bin} -n "not __fish_seen_subcommand_from ${names}" -a ${c.name} -d "${c.description}"`
  ).join('\n');
  const configLines = configCommands()
    .map(
      (cmd) =>
        `complete -c ${bin} -n "__${bin}_after_subcommand ${cmd}" -a "(__${bin}_configs)" -d "Configuration name"`
    )
    .join('\n');

  return `# fish completion for ${bin}
function __${bin}_configs
    set -l tokens (commandline -opc)
    set -l dir
    for i in (seq 2 (count $tokens))
        set -l prev $tokens[(math $i - 1)]
        if test "$prev" = --config-dir
            set dir $tokens[$i]
        else if string match -q -- '--config-dir=*' $tokens[$i]
            set dir (string replace -- '--config-dir=' '' $tokens[$i])
        end
    end
    if test -n "$dir"
        ${bin} --config-dir $dir list --names 2>/dev/null
    else
        ${bin} list --names 2>/dev/null
    end
end

function __${bin}_after_subcommand
    set -l tokens (commandline -opc)
    test "$tokens[-1]" = $argv[1]
end

complete -c ${bin} -f
complete -c ${bin} -n "not __fish_seen_subcommand_from ${names}" -l config-dir -r -a "(__fish_complete_directories)" -d "Configuration directory"
${subcommandLines}
${configLines}
complete -c ${bin} -n "__fish_seen_subcommand_from completions" -a "${SUPPORTED_SHELLS.join(' ')}"
`;
}

/**
 * Generate the completion script for a shell.
 */
export function generateCompletion(shell: Shell, bin: string): string {
  switch (shell) {
    case 'bash':
      return bashCompletion(bin);
    case 'zsh':
      return zshCompletion(bin);
    case 'fish':
      return fishCompletion(bin);
  }
}

/**
 * Execute the completions command.
 */
export function completionsCommand(shell: Shell, bin: string, options: GlobalOptions): void {
  const output = createOutput('completions', options);

  try {
    const script = generateCompletion(shell, bin);
    output.raw(script);
    output.setData('shell', shell);
    output.setData('script', script);
    finish(output, 0);
  } catch (error) {
    handleError(output, error);
  }
}
