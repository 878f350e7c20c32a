import chalk from 'chalk';
import { errorMessage } from '../errors.js';
import { generateFeatureSets } from '../features/combinations.js';
import { buildDefaultConfig } from '../config/schema.js';
import { buildMatrix, formatMatrix } from '../matrix/index.js';
import { loadWorkspace, printWarnings, readEnvironment } from './workspace.js';
import type { GlobalOptions } from './workspace.js';

export type MatrixOptions = {
  pretty?: boolean;
  packagesOnly?: boolean;
};

export async function matrixCommand(options: GlobalOptions & MatrixOptions): Promise<void> {
  const env = readEnvironment(process.env, options);

  let output: string;
  try {
    const resolved = await loadWorkspace(options, env);
    printWarnings(resolved.warnings);
    const sources = resolved.packages.map((pkg) => {
      const config = resolved.configs.get(pkg.name) ?? buildDefaultConfig();
      return {
        name: pkg.name,
        config,
        featureSets: options.packagesOnly ? [] : generateFeatureSets(pkg, config),
      };
    });
    output = formatMatrix(buildMatrix(sources, { packagesOnly: options.packagesOnly }), options.pretty);
  } catch (err) {
    console.error(chalk.red(errorMessage(err)));
    process.exit(1);
  }

  console.log(output);
}
