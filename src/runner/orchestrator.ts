import { spawn } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable } from 'node:stream';
import chalk from 'chalk';
import ora from 'ora';
import { buildDefaultConfig } from '../config/schema.js';
import type { FeatureCombinationsConfig } from '../config/schema.js';
import { DEFAULT_CARGO } from '../constants.js';
import { errorMessage } from '../errors.js';
import { generateFeatureSets } from '../features/combinations.js';
import type { FeatureSet } from '../features/feature-set.js';
import { errorData } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import type { PackageDescriptor } from '../metadata/types.js';
import { printSummary } from '../summary/format.js';
import { buildEnv, buildInvocationArgs, prepareCargoArgs, statusVerb, workingDirectory } from './command.js';
import { countDiagnostics } from './diagnostics.js';
import { classifyRun } from './outcome.js';
import type { ExitStatus, RunOutcome } from './outcome.js';
import { TeeReader, capture, writeOutput } from './tee.js';
import type { Capture, OutputStream } from './tee.js';

/** The parts of a child process the orchestrator relies on. */
export interface BuildProcess extends EventEmitter {
  readonly stderr: Readable | null;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => BuildProcess;

export interface PlannedPackage {
  pkg: PackageDescriptor;
  workingDir: string;
  featureSets: FeatureSet[];
}

export interface RunOptions {
  /** Cargo executable; `$CARGO` in the CLI. */
  cargo?: string;
  silent?: boolean;
  verbose?: boolean;
  pedantic?: boolean;
  failFast?: boolean;
  errorsOnly?: boolean;
  /** Show a spinner while silent builds run. */
  progress?: boolean;
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnFn;
  stdout?: OutputStream;
  stderr?: OutputStream;
  logger?: Logger;
  now?: () => number;
}

export interface RunReport {
  outcomes: RunOutcome[];
  exitCode: number;
  /** True when fail-fast stopped the run early. */
  aborted: boolean;
}

/**
 * Resolve the working directory and feature combinations of every package.
 * Done up front so that a bad manifest path or an oversized matrix stops the
 * run before anything is built.
 */
export function planRuns(
  packages: readonly PackageDescriptor[],
  configs: ReadonlyMap<string, FeatureCombinationsConfig>,
): PlannedPackage[] {
  return packages.map((pkg) => ({
    pkg,
    workingDir: workingDirectory(pkg.manifestPath),
    featureSets: generateFeatureSets(pkg, configs.get(pkg.name) ?? buildDefaultConfig()),
  }));
}

function waitForExit(child: BuildProcess): Promise<ExitStatus> {
  return new Promise((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => resolve({ code, signal }));
  });
}

const EMPTY_CAPTURE: Capture = { bytes: Buffer.alloc(0), error: null, mirrorError: null };

async function execute(
  spawnFn: SpawnFn,
  command: string,
  args: readonly string[],
  options: SpawnOptions,
  mirror: OutputStream | null,
): Promise<{ status: ExitStatus; output: Capture }> {
  const child = spawnFn(command, args, options);
  const exited = waitForExit(child);
  const drained = child.stderr ? capture(new TeeReader(child.stderr, mirror)) : Promise.resolve(EMPTY_CAPTURE);
  const [output, status] = await Promise.all([drained, exited]);
  return { status, output };
}

function header(
  verb: string,
  pkg: string,
  features: FeatureSet,
  command: string,
  args: readonly string[],
  verbose: boolean,
): string {
  let line = `${chalk.cyan.bold(verb)} ${pkg} ( features = [${features.display()}] )`;
  if (verbose) line += ` [${command} ${args.join(' ')}]`;
  return line;
}

/**
 * Build every planned combination in turn, mirroring cargo's stderr, and
 * print the summary. Resolves with the outcomes and the exit code the
 * process should end with.
 */
export async function runFeatureCombinations(
  plan: readonly PlannedPackage[],
  cargoArgs: readonly string[],
  options: RunOptions = {},
): Promise<RunReport> {
  const cargo = options.cargo ?? DEFAULT_CARGO;
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const spawnFn: SpawnFn = options.spawn ?? spawn;
  const now = options.now ?? Date.now;
  const silent = options.silent ?? false;
  const verbose = options.verbose ?? false;
  const logger = options.logger;

  const started = now();
  const prepared = prepareCargoArgs(cargoArgs);
  const verb = statusVerb(prepared.cargo);
  const env = buildEnv(options.env ?? process.env, { errorsOnly: options.errorsOnly });
  const outcomes: RunOutcome[] = [];

  for (const { pkg, workingDir, featureSets } of plan) {
    for (const features of featureSets) {
      const args = buildInvocationArgs(prepared, features);
      const line = header(verb, pkg.name, features, cargo, args, verbose);
      await writeOutput(stdout, silent ? `${line}\n` : `\n${line}\n\n`);

      const spinner =
        silent && options.progress ? ora({ text: `${pkg.name} [${features.display()}]`, color: 'cyan' }).start() : null;
      const runStarted = now();
      const result = await execute(
        spawnFn,
        cargo,
        args,
        { cwd: workingDir, env, stdio: ['inherit', 'inherit', 'pipe'] },
        silent ? null : stdout,
      ).finally(() => spinner?.stop());

      if (result.output.mirrorError) {
        await writeOutput(
          stderr,
          chalk.yellow(`warning: failed to write cargo output: ${errorMessage(result.output.mirrorError)}\n`),
        );
        logger?.warn('stdout_write_failed', {
          package: pkg.name,
          features: features.toString(),
          error: errorData(result.output.mirrorError),
        });
      }
      if (result.output.error) {
        await writeOutput(
          stderr,
          chalk.yellow(`warning: failed to read cargo output: ${errorMessage(result.output.error)}\n`),
        );
        logger?.warn('stderr_read_failed', {
          package: pkg.name,
          features: features.toString(),
          error: errorData(result.output.error),
        });
      }

      const counts = countDiagnostics(result.output.bytes.toString('utf-8'));
      const outcome = classifyRun({
        packageName: pkg.name,
        features,
        status: result.status,
        counts,
        pedantic: options.pedantic ?? false,
      });
      outcomes.push(outcome);
      logger?.info('combination_finished', {
        package: pkg.name,
        features: features.toString(),
        exitCode: outcome.exitCode,
        errors: outcome.errors,
        warnings: outcome.warnings,
        duration_ms: now() - runStarted,
      });

      if (options.failFast && !outcome.pedanticSuccess) {
        if (silent) await writeOutput(stdout, result.output.bytes);
        logger?.error('combination_failed_fast', {
          package: pkg.name,
          features: features.toString(),
          exitCode: outcome.exitCode,
        });
        const exitCode = await printSummary(stdout, outcomes, now() - started);
        return { outcomes, exitCode, aborted: true };
      }
    }
  }

  const exitCode = await printSummary(stdout, outcomes, now() - started);
  return { outcomes, exitCode, aborted: false };
}
