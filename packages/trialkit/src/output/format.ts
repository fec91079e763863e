// Raw ANSI codes, no chalk dependency

const useColor = !process.env.NO_COLOR;

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const CYAN = '\x1b[36m';

function wrap(code: string, s: string): string {
  return useColor ? `${code}${s}${RESET}` : s;
}

export function bold(s: string): string { return wrap(BOLD, s); }
export function dim(s: string): string { return wrap(DIM, s); }
export function red(s: string): string { return wrap(RED, s); }
export function green(s: string): string { return wrap(GREEN, s); }
export function yellow(s: string): string { return wrap(YELLOW, s); }
export function blue(s: string): string { return wrap(BLUE, s); }
export function cyan(s: string): string { return wrap(CYAN, s); }

/** Session ledger state: open sessions in yellow, ended ones green. */
export function sessionStateColor(endedAt: string | null): string {
  return endedAt ? green('ended') : yellow('open');
}

/**
 * Format data as a simple table with column headers.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(r => stripAnsi(r[i] ?? '').length))
  );

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  const separator = widths.map(w => '─'.repeat(w)).join('──');
  const bodyLines = rows.map(row =>
    row.map((cell, i) => {
      const stripped = stripAnsi(cell);
      const padding = widths[i] - stripped.length;
      return cell + ' '.repeat(Math.max(0, padding));
    }).join('  ')
  );

  return [bold(headerLine), separator, ...bodyLines].join('\n');
}

export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Print header banner for a command.
 */
export function header(title: string): void {
  console.log(`\n${bold(`[trialkit] ${title}`)}\n`);
}

/**
 * Print a warning.
 */
export function warn(msg: string): void {
  console.log(`${yellow('[trialkit]')} ${msg}`);
}

/**
 * Print an info message.
 */
export function info(msg: string): void {
  console.log(`${cyan('[trialkit]')} ${msg}`);
}

/**
 * Print a success message.
 */
export function success(msg: string): void {
  console.log(`${green('[trialkit]')} ${msg}`);
}

/**
 * Print an error to stderr.
 */
export function error(msg: string): void {
  console.error(`${red('[trialkit]')} ${msg}`);
}
