/**
 * POSIX shell quoting.
 */

/**
 * Characters that never need quoting in a POSIX shell word.
 */
const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a single argument for a POSIX shell.
 *
 * Single quotes inside the value are closed, escaped and reopened.
 */
export function shellQuote(value: string): string {
  if (value !== '' && SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render an argv array as a single shell-like line.
 */
export function renderCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map(shellQuote).join(' ');
}
