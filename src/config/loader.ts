import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { CONFIG_KEY } from '../constants.js';
import { ConfigError, errorMessage } from '../errors.js';
import type { CargoWorkspace, PackageDescriptor } from '../metadata/types.js';
import { isRecord } from './schema.js';

/** Shape of a `--fc-config` override file. */
export interface ConfigOverrides {
  workspace: Record<string, unknown>;
  packages: Record<string, Record<string, unknown>>;
}

/** Deep merge: base first, overrides on top, merging nested objects */
export function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseValue = base[key];
    const overrideValue = overrides[key];
    if (isRecord(overrideValue) && isRecord(baseValue)) {
      result[key] = deepMerge(baseValue, overrideValue);
    } else {
      result[key] = overrideValue;
    }
  }
  return result;
}

export function parseOverrides(raw: string, source: string): ConfigOverrides {
  let doc: unknown;
  try {
    doc = parse(raw);
  } catch (err) {
    throw new ConfigError(`${source} is not valid YAML`, [errorMessage(err)]);
  }

  if (doc == null) return { workspace: {}, packages: {} };
  if (!isRecord(doc)) throw new ConfigError(`invalid configuration file ${source}`, ['expected a mapping']);

  const problems: string[] = [];
  const workspace = doc.workspace ?? {};
  if (!isRecord(workspace)) problems.push('workspace must be a mapping');

  const packages: Record<string, Record<string, unknown>> = {};
  const rawPackages = doc.packages ?? {};
  if (!isRecord(rawPackages)) {
    problems.push('packages must be a mapping of package name to settings');
  } else {
    for (const [name, settings] of Object.entries(rawPackages)) {
      if (isRecord(settings)) packages[name] = settings;
      else problems.push(`packages.${name} must be a mapping`);
    }
  }

  for (const key of Object.keys(doc)) {
    if (key !== 'workspace' && key !== 'packages') problems.push(`unknown top-level key "${key}"`);
  }

  if (problems.length > 0 || !isRecord(workspace)) {
    throw new ConfigError(`invalid configuration file ${source}`, problems);
  }
  return { workspace, packages };
}

export async function loadOverrides(path: string): Promise<ConfigOverrides> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`could not read configuration file ${path}`, [errorMessage(err)]);
  }
  return parseOverrides(raw, path);
}

/** The package's raw configuration document, with overrides merged on top. */
export function packageDocument(pkg: PackageDescriptor, overrides?: ConfigOverrides): unknown {
  const fromManifest = pkg.metadata?.[CONFIG_KEY];
  const override = overrides?.packages[pkg.name];
  if (!override) return fromManifest;
  return isRecord(fromManifest) ? deepMerge(fromManifest, override) : override;
}

export function workspaceDocument(workspace: CargoWorkspace, overrides?: ConfigOverrides): unknown {
  const fromManifest = workspace.metadata?.[CONFIG_KEY];
  const override = overrides?.workspace;
  if (!override || Object.keys(override).length === 0) return fromManifest;
  return isRecord(fromManifest) ? deepMerge(fromManifest, override) : override;
}
