import { describe, expect, test } from 'vitest';
import { buildDefaultConfig } from '../../config/schema.js';
import type { FeatureCombinationsConfig } from '../../config/schema.js';
import { TooManyConfigurationsError } from '../../errors.js';
import type { DependencyDescriptor, PackageDescriptor } from '../../metadata/types.js';
import {
  eligibleFeatures,
  featureMatrix,
  generateFeatureSets,
  optionalDependencyFeatures,
} from '../combinations.js';

function makePackage(
  features: Record<string, string[]> | string[],
  dependencies: DependencyDescriptor[] = [],
): PackageDescriptor {
  const map = Array.isArray(features)
    ? Object.fromEntries(features.map((name): [string, string[]] => [name, []]))
    : features;
  return {
    name: 'testdummy',
    manifestPath: '/work/testdummy/Cargo.toml',
    features: map,
    dependencies,
    metadata: null,
  };
}

function matrix(pkg: PackageDescriptor, overrides: Partial<FeatureCombinationsConfig> = {}): string[] {
  return featureMatrix(pkg, buildDefaultConfig(overrides));
}

describe('global mode', () => {
  test('two features produce the full powerset in canonical order', () => {
    expect(matrix(makePackage(['A', 'B']))).toEqual(['', 'A', 'A,B', 'B']);
  });

  test('produces 2^n distinct subsets including empty and full', () => {
    const names = ['a', 'b', 'c', 'd', 'e'];
    const sets = generateFeatureSets(makePackage(names), buildDefaultConfig());
    expect(sets).toHaveLength(32);
    expect(new Set(sets.map((s) => s.key)).size).toBe(32);
    expect(sets[0].isEmpty()).toBe(true);
    expect(sets.some((s) => s.members.join() === names.join())).toBe(true);
    for (const set of sets) {
      expect(set.members.every((m) => names.includes(m))).toBe(true);
    }
  });

  test('is deterministic across calls', () => {
    const pkg = makePackage(['x', 'y', 'z']);
    const config = buildDefaultConfig({ exclude_feature_sets: [['x', 'z']] });
    expect(featureMatrix(pkg, config)).toEqual(featureMatrix(pkg, config));
  });

  test('exclude_features removes names from the powerset', () => {
    expect(matrix(makePackage(['default', 'A', 'B']), { exclude_features: ['default'] })).toEqual([
      '',
      'A',
      'A,B',
      'B',
    ]);
  });

  test('include_features are pinned into every combination', () => {
    expect(
      matrix(makePackage(['A', 'B', 'C']), { exclude_features: ['C'], include_features: ['C'] }),
    ).toEqual(['A,B,C', 'A,C', 'B,C', 'C']);
  });
});

describe('exclude_feature_sets', () => {
  test('drops every superset of an excluded set', () => {
    expect(matrix(makePackage(['A', 'B', 'C']), { exclude_feature_sets: [['A', 'B']] })).toEqual([
      '',
      'A',
      'A,C',
      'B',
      'B,C',
      'C',
    ]);
  });

  test('an empty excluded set drops all generated combinations', () => {
    expect(matrix(makePackage(['A']), { exclude_feature_sets: [[]] })).toEqual([]);
  });

  test('no generated set contains an excluded set', () => {
    const excluded = [['a', 'c'], ['d']];
    const sets = generateFeatureSets(
      makePackage(['a', 'b', 'c', 'd']),
      buildDefaultConfig({ exclude_feature_sets: excluded }),
    );
    for (const set of sets) {
      for (const taboo of excluded) {
        expect(taboo.every((name) => set.has(name))).toBe(false);
      }
    }
  });
});

describe('include_feature_sets', () => {
  test('inclusion wins over exclusion and unknown names are stripped', () => {
    const result = matrix(makePackage(['A', 'B']), {
      exclude_feature_sets: [['A']],
      include_feature_sets: [['A', 'ghost']],
    });
    expect(result).toEqual(['', 'A', 'B']);
    expect(result.some((s) => s.includes('ghost'))).toBe(false);
  });

  test('a forced set already generated appears once', () => {
    const result = matrix(makePackage(['A', 'B']), { include_feature_sets: [['B', 'A'], ['A', 'B']] });
    expect(result.filter((s) => s === 'A,B')).toHaveLength(1);
  });

  test('an entry of only unknown names forces the empty set', () => {
    expect(
      matrix(makePackage(['A']), { exclude_feature_sets: [[]], include_feature_sets: [['ghost']] }),
    ).toEqual(['']);
  });

  test('restores optional dependency features skipped from the base matrix', () => {
    const pkg = makePackage({ A: [], C: [], oDepB: ['dep:oDepB'] }, [
      { name: 'optDepB', rename: 'oDepB', optional: true },
    ]);
    const result = matrix(pkg, { skip_optional_dependencies: true, include_feature_sets: [['oDepB'], ['C', 'A']] });
    expect(result).toEqual(['', 'A', 'A,C', 'C', 'oDepB']);
  });
});

describe('isolated mode', () => {
  test('explores each group separately', () => {
    const result = matrix(makePackage(['A', 'B', 'C', 'D']), {
      isolated_feature_sets: [
        ['A', 'B'],
        ['C', 'D'],
      ],
    });
    // The empty set is shared by both groups and collapses.
    expect(result).toEqual(['', 'A', 'A,B', 'B', 'C', 'C,D', 'D']);
  });

  test('never mixes features from different groups', () => {
    const groups = [
      ['a', 'b', 'c'],
      ['x', 'y'],
    ];
    const sets = generateFeatureSets(
      makePackage(['a', 'b', 'c', 'x', 'y', 'z']),
      buildDefaultConfig({ isolated_feature_sets: groups, include_features: ['z'] }),
    );
    for (const set of sets) {
      const varying = set.members.filter((m) => m !== 'z');
      expect(groups.some((group) => varying.every((m) => group.includes(m)))).toBe(true);
      expect(set.has('z')).toBe(true);
    }
  });

  test('drops undeclared and excluded names from groups', () => {
    const result = matrix(makePackage(['A', 'B']), {
      isolated_feature_sets: [['A', 'B', 'ghost']],
      exclude_features: ['B'],
    });
    expect(result).toEqual(['', 'A']);
  });
});

describe('allow_feature_sets', () => {
  const pkg = makePackage(['hydrate', 'ssr', 'other']);

  test('is an exact allowlist', () => {
    expect(matrix(pkg, { allow_feature_sets: [['hydrate'], ['ssr']] })).toEqual(['hydrate', 'ssr']);
  });

  test('drops features that do not exist', () => {
    expect(matrix(pkg, { allow_feature_sets: [['hydrate', 'does-not-exist'], ['ssr']] })).toEqual([
      'hydrate',
      'ssr',
    ]);
  });

  test('combines with no_empty_feature_set', () => {
    expect(matrix(pkg, { allow_feature_sets: [[], ['hydrate']], no_empty_feature_set: true })).toEqual([
      'hydrate',
    ]);
  });
});

describe('optional dependencies', () => {
  const pkg = makePackage(
    { A: [], B: ['A'], C: ['dep:optDepC'], oDepB: ['dep:oDepB'] },
    [
      { name: 'fixDepA', rename: null, optional: false },
      { name: 'optDepB', rename: 'oDepB', optional: true },
      { name: 'optDepC', rename: null, optional: true },
    ],
  );

  test('detects only implicit dependency features', () => {
    expect([...optionalDependencyFeatures(pkg)]).toEqual(['oDepB']);
  });

  test('are part of the matrix by default', () => {
    expect(matrix(pkg)).toHaveLength(16);
  });

  test('skip_optional_dependencies leaves them out', () => {
    expect(eligibleFeatures(pkg, buildDefaultConfig({ skip_optional_dependencies: true }))).toEqual([
      'A',
      'B',
      'C',
    ]);
    expect(matrix(pkg, { skip_optional_dependencies: true })).toEqual([
      '',
      'A',
      'A,B',
      'A,B,C',
      'A,C',
      'B',
      'B,C',
      'C',
    ]);
  });
});

describe('no_empty_feature_set', () => {
  test('removes the empty combination', () => {
    expect(matrix(makePackage(['A']), { no_empty_feature_set: true })).toEqual(['A']);
  });
});

describe('combinatorial explosion', () => {
  const many = Array.from({ length: 25 }, (_, i) => `f${i}`);

  test('rejects 25 independent features', () => {
    expect(() => generateFeatureSets(makePackage(many), buildDefaultConfig())).toThrow(
      TooManyConfigurationsError,
    );
    expect(() => featureMatrix(makePackage(many), buildDefaultConfig())).toThrow('too many configurations');
  });

  test('isolation keeps the same package tractable', () => {
    const groups = [many.slice(0, 5), many.slice(5, 10)];
    const sets = generateFeatureSets(makePackage(many), buildDefaultConfig({ isolated_feature_sets: groups }));
    expect(sets).toHaveLength(32 + 32 - 1);
  });

  test('rejects an oversized isolated group', () => {
    expect(() =>
      generateFeatureSets(makePackage(many), buildDefaultConfig({ isolated_feature_sets: [many.slice(0, 20)] })),
    ).toThrow('too many configurations');
  });
});
