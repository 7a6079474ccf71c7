import logSymbols from 'log-symbols';
import { getPalette, type Palette } from './theme.js';
import { isCi, isTestEnv } from '../util/env.js';

type Style = 'warn' | 'error';
type Row = Record<string, string | number>;

function isInteractive() {
  return !!process.stdout.isTTY && !isCi();
}

let quiet = false;
let palette: Palette = getPalette(!!process.env.NO_COLOR || !isInteractive());

function configure(opts: { quiet?: boolean; noColor?: boolean }) {
  if (opts.quiet !== undefined) quiet = opts.quiet;
  if (opts.noColor) palette = getPalette(true);
}

function formatMessage(msg: string, style: Style): string {
  return style === 'warn'
    ? `${logSymbols.warning} ${palette.warn(msg)}`
    : `${logSymbols.error} ${palette.error(msg)}`;
}

function say(msg: string, style: Style) {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  if (quiet && style !== 'error') return;
  console.error(formatMessage(msg, style));
}

/** Column-aligned text table; the first row's keys are the headers. */
function formatTable(rows: readonly Row[], headerStyle: (s: string) => string): string[] {
  if (rows.length === 0) return ['(none)'];
  const headers = Object.keys(rows[0]);
  const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
  const line = (cells: string[]) => cells.join('  ').trimEnd();
  return [
    line(headers.map((h, i) => headerStyle(h.padEnd(widths[i])))),
    ...rows.map((r) => line(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])))),
  ];
}

export const ui = { configure, say, formatMessage, formatTable };
export default ui;
