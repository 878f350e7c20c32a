import { deepMerge } from '../config/loader.js';
import type { FeatureCombinationsConfig } from '../config/schema.js';
import type { FeatureSet } from '../features/feature-set.js';

export interface MatrixSource {
  name: string;
  config: FeatureCombinationsConfig;
  featureSets: readonly FeatureSet[];
}

export type MatrixEntry = Record<string, unknown>;

/**
 * One entry per (package, feature combination) for a CI job matrix. The
 * package's own `matrix` fields sit underneath; `name` and `features` always
 * win.
 */
export function buildMatrix(
  sources: readonly MatrixSource[],
  opts: { packagesOnly?: boolean } = {},
): MatrixEntry[] {
  if (opts.packagesOnly) {
    return sources.map((src) => deepMerge(src.config.matrix, { name: src.name }));
  }
  return sources.flatMap((src) =>
    src.featureSets.map((features) =>
      deepMerge(src.config.matrix, { name: src.name, features: features.toString() }),
    ),
  );
}

export function formatMatrix(matrix: readonly MatrixEntry[], pretty = false): string {
  return pretty ? JSON.stringify(matrix, null, 2) : JSON.stringify(matrix);
}
