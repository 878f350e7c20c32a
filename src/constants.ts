/** Key of the configuration table in `[package.metadata]` and `[workspace.metadata]`. */
export const CONFIG_KEY = 'cargo-feature-combinations';

/** Names cargo passes as the first argument when invoked as `cargo <name>`. */
export const SUBCOMMAND_NAMES = new Set(['fc', 'feature-combinations']);

export const DEFAULT_CARGO = 'cargo';

/** Values of `VERBOSE` that enable verbose mode (compared lowercased). */
export const VALID_BOOLS = new Set(['yes', 'true', 'y', 't']);

/**
 * Upper bound on the combinations a single package may produce. Checked
 * against `2^k` before any powerset is materialized.
 */
export const MAX_FEATURE_COMBINATIONS = 2 ** 18;

/** Directory under cargo's target dir holding our logs. */
export const TARGET_SUBDIR = 'feature-combinations';

export function isTruthyEnv(value: string | undefined): boolean {
  return VALID_BOOLS.has((value ?? '').toLowerCase());
}
