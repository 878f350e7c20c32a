import type { FeatureCombinationsConfig } from '../config/schema.js';
import { MAX_FEATURE_COMBINATIONS } from '../constants.js';
import { TooManyConfigurationsError } from '../errors.js';
import type { PackageDescriptor } from '../metadata/types.js';
import { FeatureSet, sortFeatureSets } from './feature-set.js';

/**
 * Features cargo creates implicitly for optional dependencies: named after the
 * dependency and enabling nothing but `dep:<name>`.
 */
export function optionalDependencyFeatures(pkg: PackageDescriptor): Set<string> {
  const implicit = new Set<string>();
  for (const dep of pkg.dependencies) {
    if (!dep.optional) continue;
    const name = dep.rename ?? dep.name;
    const implied = pkg.features[name];
    if (implied && implied.length === 1 && implied[0] === `dep:${name}`) {
      implicit.add(name);
    }
  }
  return implicit;
}

/** Declared features that may vary, in canonical order. */
export function eligibleFeatures(pkg: PackageDescriptor, config: FeatureCombinationsConfig): string[] {
  const excluded = new Set(config.exclude_features);
  const optional = config.skip_optional_dependencies ? optionalDependencyFeatures(pkg) : new Set<string>();
  return FeatureSet.of(Object.keys(pkg.features)).members.filter(
    (name) => !excluded.has(name) && !optional.has(name),
  );
}

function assertTractable(pkg: PackageDescriptor, combinations: number): void {
  if (combinations > MAX_FEATURE_COMBINATIONS) {
    throw new TooManyConfigurationsError(pkg.name, combinations, MAX_FEATURE_COMBINATIONS);
  }
}

/** Every subset of `names`, each unioned with `pinned`. Caller bounds `names.length`. */
function powerset(names: readonly string[], pinned: readonly string[]): FeatureSet[] {
  const total = 2 ** names.length;
  const sets: FeatureSet[] = [];
  for (let mask = 0; mask < total; mask++) {
    const members = names.filter((_, bit) => (mask & (1 << bit)) !== 0);
    sets.push(FeatureSet.of([...members, ...pinned]));
  }
  return sets;
}

function candidateSets(pkg: PackageDescriptor, config: FeatureCombinationsConfig): FeatureSet[] {
  const declared = new Set(Object.keys(pkg.features));

  if (config.allow_feature_sets.length > 0) {
    return config.allow_feature_sets.map((set) => FeatureSet.of(set).filter((name) => declared.has(name)));
  }

  const eligible = eligibleFeatures(pkg, config);

  if (config.isolated_feature_sets.length > 0) {
    const allowed = new Set(eligible);
    const groups = config.isolated_feature_sets.map(
      (group) => FeatureSet.of(group).filter((name) => allowed.has(name)).members,
    );
    let total = 0;
    for (const group of groups) {
      assertTractable(pkg, 2 ** group.length);
      total += 2 ** group.length;
    }
    assertTractable(pkg, total);
    return groups.flatMap((group) => powerset(group, config.include_features));
  }

  assertTractable(pkg, 2 ** eligible.length);
  return powerset(eligible, config.include_features);
}

/**
 * All feature combinations to build for `pkg`, deduplicated and sorted.
 *
 * Exclusion is by subset: a combination is dropped when it contains every
 * feature of some `exclude_feature_sets` entry, so an empty entry drops all
 * generated combinations. Entries of `include_feature_sets` are added after
 * every filter and always appear.
 */
export function generateFeatureSets(pkg: PackageDescriptor, config: FeatureCombinationsConfig): FeatureSet[] {
  let sets = candidateSets(pkg, config);

  if (config.allow_feature_sets.length === 0) {
    const excluded = config.exclude_feature_sets.map((set) => FeatureSet.of(set));
    sets = sets.filter((set) => !excluded.some((taboo) => taboo.isSubsetOf(set)));
  }

  if (config.no_empty_feature_set) {
    sets = sets.filter((set) => !set.isEmpty());
  }

  const declared = new Set(Object.keys(pkg.features));
  const forced = config.include_feature_sets.map((set) => FeatureSet.of(set).filter((name) => declared.has(name)));

  return sortFeatureSets([...sets, ...forced]);
}

/** Comma-joined combinations, as passed to `--features=`. */
export function featureMatrix(pkg: PackageDescriptor, config: FeatureCombinationsConfig): string[] {
  return generateFeatureSets(pkg, config).map((set) => set.toString());
}
