/**
 * String utilities
 */

const SAFE_SHELL_WORD = /^[\w@%+=:,./-]+$/;

/**
 * Quote a single argument so it can be pasted into a POSIX shell
 */
export function shellQuote(word: string): string {
  if (word === "") {
    return "''";
  }
  if (SAFE_SHELL_WORD.test(word)) {
    return word;
  }
  return "'" + word.replace(/'/g, `'"'"'`) + "'";
}

/**
 * Render a command line, including environment overrides, as a shell would read it
 */
export function formatCommand(
  command: string,
  args: readonly string[],
  env: Record<string, string> = {},
): string {
  const assignments = Object.entries(env).map(([name, value]) => `${name}=${shellQuote(value)}`);
  return [...assignments, command, ...args.map(shellQuote)].join(" ");
}
