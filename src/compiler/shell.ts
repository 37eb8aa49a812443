/**
 * POSIX shell quoting.
 */

const SAFE_TOKEN = /^[\w@%+=:,./-]+$/;

/**
 * Quote `arg` for a POSIX shell. Tokens made only of safe characters are
 * returned as they are; anything else is wrapped in single quotes.
 */
export function quoteShellArg(arg: string): string {
  if (arg === "") {
    return "''";
  }
  if (SAFE_TOKEN.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Join a command and its arguments into one line, quoting each token.
 */
export function shellCommand(argv: readonly (string | number)[]): string {
  return argv.map((arg) => quoteShellArg(String(arg))).join(" ");
}
