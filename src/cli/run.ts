import chalk from 'chalk';
import { errorMessage } from '../errors.js';
import { createLogger, errorData } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { planRuns, runFeatureCombinations } from '../runner/orchestrator.js';
import type { PlannedPackage } from '../runner/orchestrator.js';
import { loadWorkspace, printWarnings, readEnvironment, stateDir } from './workspace.js';
import type { GlobalOptions, ResolvedWorkspace } from './workspace.js';

export async function runCommand(cargoArgs: string[], options: GlobalOptions): Promise<void> {
  const env = readEnvironment(process.env, options);

  let resolved: ResolvedWorkspace;
  let plan: PlannedPackage[];
  try {
    resolved = await loadWorkspace(options, env);
    plan = planRuns(resolved.packages, resolved.configs);
  } catch (err) {
    console.error(chalk.red(errorMessage(err)));
    process.exit(1);
  }

  printWarnings(resolved.warnings);

  let logger: Logger | undefined;
  try {
    logger = await createLogger(stateDir(resolved.workspace), { verbose: env.verbose });
  } catch (err) {
    // Builds still run without a log file.
    if (env.verbose) console.error(chalk.dim(`logging disabled: ${errorMessage(err)}`));
  }

  for (const w of resolved.warnings) logger?.warn('config_warning', { context: { warning: w } });
  logger?.info('run_start', {
    context: {
      packages: plan.map((p) => p.pkg.name),
      combinations: plan.reduce((n, p) => n + p.featureSets.length, 0),
      cargoArgs,
    },
  });

  try {
    const report = await runFeatureCombinations(plan, cargoArgs, {
      cargo: env.cargo,
      silent: options.silent,
      verbose: env.verbose,
      pedantic: options.pedantic,
      failFast: options.failFast,
      errorsOnly: options.errorsOnly,
      progress: options.silent === true && process.stderr.isTTY,
      logger,
    });
    logger?.info('run_complete', {
      exitCode: report.exitCode,
      context: { combinations: report.outcomes.length, aborted: report.aborted },
    });
    await logger?.flush();
    process.exit(report.exitCode);
  } catch (err) {
    logger?.fatal('run_failed', { error: errorData(err) });
    await logger?.flush();
    console.error(chalk.red(errorMessage(err)));
    process.exit(1);
  }
}
