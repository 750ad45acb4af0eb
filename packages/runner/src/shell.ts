const SHELL_SAFE = /^[\w@%+=:,./-]+$/;

/** Quotes an argument only when a POSIX shell would otherwise split or expand it. */
export function shellQuote(arg: string): string {
  if (arg === '') return "''";
  if (SHELL_SAFE.test(arg)) return arg;
  return singleQuote(arg);
}

/** Always single-quotes; used where the text is re-read by a remote shell. */
export function singleQuote(arg: string): string {
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isEnvName(name: string): boolean {
  return ENV_NAME.test(name);
}
