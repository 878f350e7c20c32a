import chalk from 'chalk';
import type { RunOutcome } from '../runner/outcome.js';
import { writeOutput } from '../runner/tee.js';
import type { OutputStream } from '../runner/tee.js';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count > 1 ? 's' : ''}`;
}

function statusLabel(outcome: RunOutcome): string {
  if (!outcome.pedanticSuccess) return chalk.red.bold('FAIL');
  if (outcome.warnings > 0) return chalk.yellow.bold('WARN');
  return chalk.green.bold('PASS');
}

export function formatSummary(outcomes: readonly RunOutcome[], elapsedMs: number): string {
  const packages = new Set(outcomes.map((o) => o.packageName)).size;
  const combinations = new Set(outcomes.map((o) => `${o.packageName}\0${o.features.key}`)).size;
  const seconds = (elapsedMs / 1000).toFixed(2);

  const errorsWidth = String(Math.max(0, ...outcomes.map((o) => o.errors))).length;
  const warningsWidth = String(Math.max(0, ...outcomes.map((o) => o.warnings))).length;

  const lines = [
    '',
    `${chalk.cyan.bold('    Finished')} ${plural(combinations, 'total feature combination')} for ${plural(packages, 'package')} in ${seconds}s`,
    '',
  ];
  for (const o of outcomes) {
    const errors = String(o.errors).padStart(errorsWidth);
    const warnings = String(o.warnings).padStart(warningsWidth);
    lines.push(
      `        ${statusLabel(o)} ${o.packageName} ( ${errors} errors, ${warnings} warnings, features = [${o.features.display()}] )`,
    );
  }
  lines.push('');
  return lines.join('\n') + '\n';
}

/**
 * Exit code of the whole run: that of the first failed combination.
 *
 * A combination that failed only under `--pedantic` exited 0, and one killed
 * by a signal has no code. Both map to 1 on purpose, so that CI fails the job
 * instead of passing it on cargo's 0.
 */
export function summaryExitCode(outcomes: readonly RunOutcome[]): number {
  const firstBad = outcomes.find((o) => !o.pedanticSuccess);
  if (!firstBad) return 0;
  return firstBad.exitCode === null || firstBad.exitCode === 0 ? 1 : firstBad.exitCode;
}

/** Write the summary and return the exit code it implies. */
export async function printSummary(
  out: OutputStream,
  outcomes: readonly RunOutcome[],
  elapsedMs: number,
): Promise<number> {
  await writeOutput(out, formatSummary(outcomes, elapsedMs));
  return summaryExitCode(outcomes);
}
