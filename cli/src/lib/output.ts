import { hasFlag } from './parse.js';
import type { ParsedFlags } from './parse.js';

type Style = 'bold' | 'dim' | 'red' | 'green' | 'yellow' | 'cyan';

const SGR: Record<Style, number> = { bold: 1, dim: 2, red: 31, green: 32, yellow: 33, cyan: 36 };

const colorEnabled =
  process.stdout.isTTY === true && process.env.NO_COLOR === undefined && !process.argv.includes('--no-color');

/** Wrap `text` in a single escape sequence carrying every style. */
export function paint(text: string, ...styles: Style[]): string {
  if (!colorEnabled || styles.length === 0) return text;
  return `\x1b[${styles.map((style) => SGR[style]).join(';')}m${text}\x1b[0m`;
}

export const bold = (text: string): string => paint(text, 'bold');
export const dim = (text: string): string => paint(text, 'dim');
export const cyan = (text: string): string => paint(text, 'cyan');
export const boldCyan = (text: string): string => paint(text, 'bold', 'cyan');

/** How a command reports its result: decorated text, the bare result, or JSON. */
export type OutputMode = 'human' | 'quiet' | 'json';

export function outputMode(flags: ParsedFlags): OutputMode {
  if (hasFlag(flags, 'json')) return 'json';
  return hasFlag(flags, 'quiet') ? 'quiet' : 'human';
}

const LABEL_WIDTH = 20;

export function printHeader(title: string): void {
  console.log(`\n ${bold(title)}\n`);
}

export function printKeyValue(key: string, value: string): void {
  console.log(`  ${dim(key.padEnd(LABEL_WIDTH))}${value}`);
}

export function printSuccess(message: string): void {
  console.log(`  ${paint('✔', 'green')} ${message}`);
}

export function printWarning(message: string): void {
  console.log(`  ${paint('⚠', 'yellow')} ${message}`);
}

export function printError(message: string): void {
  console.error(`\n  ${paint('✘', 'red')} ${bold('Error:')} ${message}`);
}

export function printHint(message: string): void {
  console.error(`  ${dim(message)}`);
}

export function printBlank(): void {
  console.log();
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function control(sequence: string): void {
  if (process.stdout.isTTY) process.stdout.write(sequence);
}

export const clearLine = (): void => control('\x1b[2K\r');
export const hideCursor = (): void => control('\x1b[?25l');
export const showCursor = (): void => control('\x1b[?25h');

export function cursorUp(lines: number): void {
  if (lines > 0) control(`\x1b[${lines}A`);
}
