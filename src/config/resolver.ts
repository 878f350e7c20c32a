import { ConfigError } from '../errors.js';
import type { PackageDescriptor } from '../metadata/types.js';
import {
  DEPRECATED_FIELDS,
  buildDefaultConfig,
  isRecord,
  parseConfigDocument,
  parseWorkspaceDocument,
} from './schema.js';
import type { FeatureCombinationsConfig, LegacyConfigFields, WorkspaceConfig } from './schema.js';

export interface Resolution<T> {
  config: T;
  warnings: string[];
}

function union(base: string[], extra: string[]): string[] {
  return [...new Set([...base, ...extra])];
}

/**
 * Fold deprecated fields into their replacements. Set-like fields are
 * unioned, list fields appended. Returns a fresh config.
 */
export function migrateLegacyFields(
  current: FeatureCombinationsConfig,
  legacy: Partial<LegacyConfigFields>,
): Resolution<FeatureCombinationsConfig> {
  const config: FeatureCombinationsConfig = { ...current };
  const warnings: string[] = [];

  for (const field of DEPRECATED_FIELDS) {
    if (field.kind === 'set') {
      const value = legacy[field.old];
      if (!value || value.length === 0) continue;
      config[field.replacement] = union(config[field.replacement], value);
    } else {
      const value = legacy[field.old];
      if (!value || value.length === 0) continue;
      config[field.replacement] = [...config[field.replacement], ...value];
    }
    warnings.push(`\`${field.old}\` is deprecated, use \`${field.replacement}\` instead`);
  }

  return { config, warnings };
}

/**
 * Turn a package's raw configuration document into a validated config.
 * A missing document yields the defaults; a malformed one throws.
 */
export function resolveConfig(raw: unknown, packageName: string): Resolution<FeatureCombinationsConfig> {
  if (raw == null) return { config: buildDefaultConfig(), warnings: [] };
  if (!isRecord(raw)) {
    throw new ConfigError(`invalid configuration for package ${packageName}`, [
      'expected a table of settings',
    ]);
  }

  const parsed = parseConfigDocument(raw);
  if (parsed.errors.length > 0) {
    throw new ConfigError(`invalid configuration for package ${packageName}`, parsed.errors);
  }

  const migrated = migrateLegacyFields(parsed.config, parsed.legacy);
  return {
    config: migrated.config,
    warnings: [...parsed.warnings, ...migrated.warnings].map((w) => `${packageName}: ${w}`),
  };
}

export function resolveWorkspaceConfig(raw: unknown): Resolution<WorkspaceConfig> {
  if (raw == null) return { config: { exclude_packages: [] }, warnings: [] };
  if (!isRecord(raw)) {
    throw new ConfigError('invalid workspace configuration', ['expected a table of settings']);
  }

  const parsed = parseWorkspaceDocument(raw);
  if (parsed.errors.length > 0) {
    throw new ConfigError('invalid workspace configuration', parsed.errors);
  }
  return { config: parsed.config, warnings: parsed.warnings.map((w) => `workspace: ${w}`) };
}

export interface PackageSelection {
  workspaceConfig: WorkspaceConfig;
  /** Name of the package at the workspace root, if the root manifest has one. */
  rootPackage: string | null;
  configs: ReadonlyMap<string, FeatureCombinationsConfig>;
  /** Names given with `--package`; empty means all. */
  include?: Iterable<string>;
  /** Names given with `--exclude-package`. */
  exclude?: Iterable<string>;
}

/**
 * Apply workspace-level, root-package and command-line package filters,
 * preserving the input order.
 */
export function selectPackages(
  packages: readonly PackageDescriptor[],
  selection: PackageSelection,
): { packages: PackageDescriptor[]; warnings: string[] } {
  const warnings: string[] = [];
  const excluded = new Set<string>([
    ...selection.workspaceConfig.exclude_packages,
    ...(selection.exclude ?? []),
  ]);

  for (const pkg of packages) {
    const declared = selection.configs.get(pkg.name)?.exclude_packages ?? [];
    if (declared.length === 0) continue;
    if (pkg.name === selection.rootPackage) {
      for (const name of declared) excluded.add(name);
    } else {
      warnings.push(
        `${pkg.name}: \`exclude_packages\` only has an effect on the root package or in ` +
          '[workspace.metadata.cargo-feature-combinations]; ignoring it',
      );
    }
  }

  const include = new Set(selection.include ?? []);
  const selected = packages.filter(
    (pkg) => !excluded.has(pkg.name) && (include.size === 0 || include.has(pkg.name)),
  );

  return { packages: selected, warnings };
}
