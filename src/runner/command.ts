import { dirname } from 'node:path';
import { ManifestPathError } from '../errors.js';
import type { FeatureSet } from '../features/feature-set.js';

/** Cargo arguments split at the first `--`; `extra` keeps the separator. */
export interface CargoArgs {
  cargo: string[];
  extra: string[];
}

export function splitCargoArgs(args: readonly string[]): CargoArgs {
  const idx = args.indexOf('--');
  if (idx === -1) return { cargo: [...args], extra: [] };
  return { cargo: args.slice(0, idx), extra: args.slice(idx) };
}

/** True if `arg` is present, either bare or as `arg=value`. */
export function hasArg(args: readonly string[], arg: string): boolean {
  return args.some((a) => a === arg || a.startsWith(`${arg}=`));
}

/**
 * Arguments shared by every run: forces colored output unless the caller
 * chose a `--color` mode. `bare` is set when the caller passed no arguments
 * at all, in which case no feature flags are injected.
 */
export function prepareCargoArgs(args: readonly string[]): CargoArgs & { bare: boolean } {
  const { cargo, extra } = splitCargoArgs(args);
  const bare = cargo.length === 0 && extra.length === 0;
  const withColor = hasArg(cargo, '--color') ? cargo : [...cargo, '--color', 'always'];
  return { cargo: withColor, extra, bare };
}

/** Full argument vector for one feature combination. */
export function buildInvocationArgs(prepared: CargoArgs & { bare: boolean }, features: FeatureSet): string[] {
  const args = [...prepared.cargo];
  if (!prepared.bare) {
    args.push('--no-default-features', `--features=${features.toString()}`);
  }
  return [...args, ...prepared.extra];
}

/** Directory the build runs in: the one holding the package manifest. */
export function workingDirectory(manifestPath: string): string {
  const dir = dirname(manifestPath);
  if (manifestPath === '' || dir === manifestPath) throw new ManifestPathError(manifestPath);
  return dir;
}

/** Right-aligned status verb matching cargo's own progress lines. */
export function statusVerb(cargoArgs: readonly string[]): string {
  if (hasArg(cargoArgs, 'build')) return '    Building';
  if (hasArg(cargoArgs, 'check') || hasArg(cargoArgs, 'clippy')) return '    Checking';
  if (hasArg(cargoArgs, 'test')) return '     Testing';
  return '     Running';
}

/**
 * Environment for the spawned cargo. In errors-only mode rustc is told to
 * allow all warnings through `RUSTFLAGS`, keeping any flags already set.
 */
export function buildEnv(base: NodeJS.ProcessEnv, opts: { errorsOnly?: boolean }): NodeJS.ProcessEnv {
  if (!opts.errorsOnly) return { ...base };
  const rustflags = [base.RUSTFLAGS?.trim(), '-Awarnings'].filter(Boolean).join(' ');
  return { ...base, RUSTFLAGS: rustflags };
}
