// src/utils/errors.ts
import { isValidationError, describeValidationError } from '../games/poker/errors.js';

export type ErrorInfo = { name: string; message: string; stack: string };

export function shortStack(err: unknown, lines = 3): string {
  const st = err instanceof Error && err.stack ? err.stack : '';
  if (!st) return '';
  return st.split('\n').slice(0, lines + 1).join('\n');
}

export function normalizeError(err: unknown): ErrorInfo {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

/** One or two lines for the terminal. Validation errors get their hint, anything else its type and a short stack when verbose. */
export function formatUserError(context: string, err: unknown, verbose = false): string {
  if (isValidationError(err)) return `${context}: ${describeValidationError(err)}`;
  const info = normalizeError(err);
  const base = `${context} failed (${info.name}): ${info.message}`;
  const stack = verbose ? shortStack(err, 6) : '';
  return stack ? `${base}\n${stack.replaceAll(process.cwd(), '.')}` : base;
}
