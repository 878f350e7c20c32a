import { join } from 'node:path';
import chalk from 'chalk';
import { loadOverrides, packageDocument, workspaceDocument } from '../config/loader.js';
import type { ConfigOverrides } from '../config/loader.js';
import { resolveConfig, resolveWorkspaceConfig, selectPackages } from '../config/resolver.js';
import type { FeatureCombinationsConfig } from '../config/schema.js';
import { DEFAULT_CARGO, TARGET_SUBDIR, isTruthyEnv } from '../constants.js';
import { loadCargoWorkspace } from '../metadata/index.js';
import type { CargoWorkspace, PackageDescriptor } from '../metadata/types.js';

/** Options shared by the build command and `matrix`. */
export type GlobalOptions = {
  manifestPath?: string;
  package: string[];
  excludePackage: string[];
  silent?: boolean;
  verbose?: boolean;
  pedantic?: boolean;
  errorsOnly?: boolean;
  failFast?: boolean;
  /** `--fc-config`; cargo keeps its own `--config`. */
  fcConfig?: string;
};

export interface ResolvedWorkspace {
  workspace: CargoWorkspace;
  packages: PackageDescriptor[];
  configs: Map<string, FeatureCombinationsConfig>;
  warnings: string[];
}

/**
 * Resolve every member's configuration and apply the package filters.
 * Throws `ConfigError` on the first malformed document.
 */
export function resolveWorkspace(
  workspace: CargoWorkspace,
  opts: { overrides?: ConfigOverrides; include?: string[]; exclude?: string[] } = {},
): ResolvedWorkspace {
  const workspaceResolution = resolveWorkspaceConfig(workspaceDocument(workspace, opts.overrides));
  const warnings = [...workspaceResolution.warnings];

  const configs = new Map<string, FeatureCombinationsConfig>();
  for (const pkg of workspace.packages) {
    const resolution = resolveConfig(packageDocument(pkg, opts.overrides), pkg.name);
    configs.set(pkg.name, resolution.config);
    warnings.push(...resolution.warnings);
  }

  const selection = selectPackages(workspace.packages, {
    workspaceConfig: workspaceResolution.config,
    rootPackage: workspace.rootPackage,
    configs,
    include: opts.include,
    exclude: opts.exclude,
  });
  warnings.push(...selection.warnings);

  return { workspace, packages: selection.packages, configs, warnings };
}

export interface Environment {
  cargo: string;
  verbose: boolean;
}

export function readEnvironment(env: NodeJS.ProcessEnv, options: Pick<GlobalOptions, 'verbose'>): Environment {
  return {
    cargo: env.CARGO || DEFAULT_CARGO,
    verbose: options.verbose === true || isTruthyEnv(env.VERBOSE),
  };
}

/** Directory for our logs inside cargo's target dir. */
export function stateDir(workspace: CargoWorkspace): string {
  return join(workspace.targetDirectory, TARGET_SUBDIR);
}

/** Run `cargo metadata`, read the override file and resolve configuration. */
export async function loadWorkspace(options: GlobalOptions, env: Environment): Promise<ResolvedWorkspace> {
  const workspace = await loadCargoWorkspace({ cargo: env.cargo, manifestPath: options.manifestPath });
  const overrides = options.fcConfig ? await loadOverrides(options.fcConfig) : undefined;
  return resolveWorkspace(workspace, {
    overrides,
    include: options.package,
    exclude: options.excludePackage,
  });
}

export function printWarnings(warnings: readonly string[]): void {
  for (const w of warnings) {
    console.error(chalk.yellow(`warning: ${w}`));
  }
}
