import { stripVTControlCharacters } from 'node:util';

/** `warning: `foo` (lib) generated 6 warnings` */
const WARNING_REGEX = /warning: .* generated (\d+) warnings?/g;
/** `error: could not compile `foo` (lib) due to 2 previous errors`; the count is absent for one error. */
const ERROR_REGEX = /error: could not compile `.*` due to\s*(\d*)\s*previous errors?/g;

export interface DiagnosticCounts {
  warnings: number;
  errors: number;
}

export function stripAnsi(output: string): string {
  return stripVTControlCharacters(output);
}

/** Per-unit warning counts, in output order. */
export function warningCounts(output: string): number[] {
  return [...output.matchAll(WARNING_REGEX)].map((m) => Number.parseInt(m[1], 10) || 0);
}

/** Per-unit error counts, in output order. */
export function errorCounts(output: string): number[] {
  return [...output.matchAll(ERROR_REGEX)].map((m) => (m[1] === '' ? 1 : Number.parseInt(m[1], 10) || 1));
}

function sum(values: number[]): number {
  return values.reduce((total, n) => total + n, 0);
}

/** Count diagnostics in raw (possibly colored) cargo stderr. */
export function countDiagnostics(rawOutput: string): DiagnosticCounts {
  const output = stripAnsi(rawOutput);
  return {
    warnings: sum(warningCounts(output)),
    errors: sum(errorCounts(output)),
  };
}
