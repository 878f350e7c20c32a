import type { FeatureSet } from '../features/feature-set.js';
import type { DiagnosticCounts } from './diagnostics.js';

/** Result of one cargo invocation. Never mutated once recorded. */
export interface RunOutcome {
  readonly packageName: string;
  readonly features: FeatureSet;
  /** `null` when the process was killed by a signal. */
  readonly exitCode: number | null;
  readonly warnings: number;
  readonly errors: number;
  /** Passed, and in pedantic mode also free of warnings and errors. */
  readonly pedanticSuccess: boolean;
}

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export function classifyRun(input: {
  packageName: string;
  features: FeatureSet;
  status: ExitStatus;
  counts: DiagnosticCounts;
  pedantic: boolean;
}): RunOutcome {
  const fail = input.status.code !== 0 || input.status.signal !== null;
  const pedanticFail = input.pedantic && (input.counts.errors > 0 || input.counts.warnings > 0);
  return Object.freeze({
    packageName: input.packageName,
    features: input.features,
    exitCode: input.status.code,
    warnings: input.counts.warnings,
    errors: input.counts.errors,
    pedanticSuccess: !(fail || pedanticFail),
  });
}
