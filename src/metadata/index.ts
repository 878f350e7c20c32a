import { execFile } from 'node:child_process';
import { join } from 'node:path';
import { promisify } from 'node:util';
import { isRecord, isStringList } from '../config/schema.js';
import { MetadataError, errorMessage } from '../errors.js';
import type { CargoWorkspace, DependencyDescriptor, PackageDescriptor } from './types.js';

export type { CargoWorkspace, DependencyDescriptor, PackageDescriptor } from './types.js';

const execFileAsync = promisify(execFile);

/** `cargo metadata` output can be large for big workspaces. */
const METADATA_MAX_BUFFER = 64 * 1024 * 1024;

function requireString(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string') throw new MetadataError(`cargo metadata: ${where}.${key} is not a string`);
  return value;
}

function parseFeatures(raw: unknown, where: string): Record<string, string[]> {
  if (raw == null) return {};
  if (!isRecord(raw)) throw new MetadataError(`cargo metadata: ${where}.features is not an object`);
  const features: Record<string, string[]> = {};
  for (const [name, implied] of Object.entries(raw)) {
    if (!isStringList(implied)) {
      throw new MetadataError(`cargo metadata: ${where}.features.${name} is not a list of strings`);
    }
    features[name] = implied;
  }
  return features;
}

function parseDependencies(raw: unknown, where: string): DependencyDescriptor[] {
  if (raw == null) return [];
  if (!Array.isArray(raw)) throw new MetadataError(`cargo metadata: ${where}.dependencies is not a list`);
  return raw.map((dep, idx) => {
    if (!isRecord(dep)) throw new MetadataError(`cargo metadata: ${where}.dependencies[${idx}] is not an object`);
    return {
      name: requireString(dep, 'name', `${where}.dependencies[${idx}]`),
      rename: typeof dep.rename === 'string' ? dep.rename : null,
      optional: dep.optional === true,
    };
  });
}

function parsePackage(raw: unknown, idx: number): PackageDescriptor & { id: string } {
  const where = `packages[${idx}]`;
  if (!isRecord(raw)) throw new MetadataError(`cargo metadata: ${where} is not an object`);
  return {
    id: requireString(raw, 'id', where),
    name: requireString(raw, 'name', where),
    manifestPath: requireString(raw, 'manifest_path', where),
    features: parseFeatures(raw.features, where),
    dependencies: parseDependencies(raw.dependencies, where),
    metadata: isRecord(raw.metadata) ? raw.metadata : null,
  };
}

/**
 * Parse the JSON printed by `cargo metadata --format-version 1`, keeping the
 * workspace members in the order cargo lists them.
 */
export function parseCargoMetadata(json: string): CargoWorkspace {
  let doc: unknown;
  try {
    doc = JSON.parse(json);
  } catch (err) {
    throw new MetadataError(`cargo metadata printed invalid JSON: ${errorMessage(err)}`);
  }
  if (!isRecord(doc)) throw new MetadataError('cargo metadata: expected a JSON object');

  const root = requireString(doc, 'workspace_root', 'metadata');
  const targetDirectory = requireString(doc, 'target_directory', 'metadata');
  if (!Array.isArray(doc.packages)) throw new MetadataError('cargo metadata: packages is not a list');
  const all = doc.packages.map(parsePackage);

  const members = Array.isArray(doc.workspace_members)
    ? doc.workspace_members.filter((id): id is string => typeof id === 'string')
    : all.map((pkg) => pkg.id);
  const byId = new Map(all.map((pkg) => [pkg.id, pkg]));
  const packages: PackageDescriptor[] = [];
  for (const id of members) {
    const pkg = byId.get(id);
    if (!pkg) continue;
    const { id: _id, ...descriptor } = pkg;
    packages.push(descriptor);
  }

  const rootManifest = join(root, 'Cargo.toml');
  const rootPackage = packages.find((pkg) => pkg.manifestPath === rootManifest)?.name ?? null;

  return {
    root,
    targetDirectory,
    rootPackage,
    metadata: isRecord(doc.metadata) ? doc.metadata : null,
    packages,
  };
}

export interface LoadWorkspaceOptions {
  cargo: string;
  manifestPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/** Run `cargo metadata` for the workspace containing `manifestPath` (or the cwd). */
export async function loadCargoWorkspace(opts: LoadWorkspaceOptions): Promise<CargoWorkspace> {
  const args = ['metadata', '--format-version', '1', '--no-deps'];
  if (opts.manifestPath) args.push('--manifest-path', opts.manifestPath);

  let stdout: string;
  try {
    const result = await execFileAsync(opts.cargo, args, {
      cwd: opts.cwd,
      env: opts.env,
      maxBuffer: METADATA_MAX_BUFFER,
      encoding: 'utf-8',
    });
    stdout = result.stdout;
  } catch (err) {
    const stderr = isRecord(err) && typeof err.stderr === 'string' ? err.stderr.trim() : '';
    throw new MetadataError(`\`${opts.cargo} ${args.join(' ')}\` failed: ${stderr || errorMessage(err)}`);
  }

  return parseCargoMetadata(stdout);
}
