import type { Writer } from './lib/output.js';

// ANSI color codes
export const colors = {
  reset: '\x1b[0m',
  green: '\x1b[92m',
  red: '\x1b[31m',
  yellow: '\x1b[33m'
} as const;

// Symbols
export const symbols = {
  error: '✗',
  warning: '⚠',
  log: '📋'
} as const;

export type Color = keyof typeof colors;

export function colorize(message: string, color: Color = 'reset'): string {
  return `${colors[color]}${message}${colors.reset}`;
}

/**
 * Print colored message (one line) through the given writer
 */
export function print(out: Writer, message: string, color: Color = 'reset'): void {
  out.write(`${colorize(message, color)}\n`);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
