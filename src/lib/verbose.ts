/**
 * Echo of external commands for --verbose.
 */

const GRAY = '\x1b[90m';
const RESET = '\x1b[0m';

/**
 * Whether the stream is an interactive terminal that renders color.
 */
export function supportsAnsi(stream: { isTTY?: boolean } = process.stderr): boolean {
  return stream.isTTY === true;
}

/**
 * Render a command line as a block framed by blank lines.
 *
 * Lines after the first (multi-line remote commands) are aligned under the
 * text of the first one.
 */
export function formatCommand(line: string, prefix: string, ansi: boolean): string {
  const pad = ' '.repeat(prefix.length);
  const body = line
    .split('\n')
    .map((text, i) => `${i === 0 ? prefix : pad}${text}\n`)
    .join('');
  const block = `\n${body}\n`;
  return ansi ? `${GRAY}${block}${RESET}` : block;
}
