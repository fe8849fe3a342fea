/**
 * Parameter Substitution
 *
 * Replaces ${NAME} placeholders in stored arguments with environment values
 * at launch time.
 */

/**
 * Placeholder pattern: `${` followed by one or more characters other than `}`, then `}`.
 */
const PLACEHOLDER_PATTERN = /\$\{([^}]+)\}/g;

/**
 * Look up a variable in an environment snapshot.
 *
 * Only own string-valued keys count, so names such as `toString` or `__proto__`
 * are unset unless the environment really defines them.
 */
export function lookupVar(env: NodeJS.ProcessEnv, varName: string): string | undefined {
  if (!Object.hasOwn(env, varName)) {
    return undefined;
  }
  const value = env[varName];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Substitute placeholders in a single argument.
 *
 * Unset variables leave their placeholder in place, delimiters included.
 * Substituted values are not scanned again.
 */
export function substituteArg(arg: string, env: NodeJS.ProcessEnv = process.env): string {
  return arg.replace(PLACEHOLDER_PATTERN, (placeholder: string, varName: string) => {
    return lookupVar(env, varName) ?? placeholder;
  });
}

/**
 * Substitute placeholders in every argument.
 *
 * @param args - Stored argument list
 * @param env - Environment snapshot (default: process.env)
 * @returns New list of the same length
 */
export function substituteParams(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): string[] {
  return args.map((arg) => substituteArg(arg, env));
}

/**
 * List the variable names referenced by placeholders, in order of first use.
 */
export function findPlaceholders(args: readonly string[]): string[] {
  const names = new Set<string>();
  for (const arg of args) {
    for (const match of arg.matchAll(PLACEHOLDER_PATTERN)) {
      const varName = match[1];
      if (varName !== undefined) {
        names.add(varName);
      }
    }
  }
  return [...names];
}
