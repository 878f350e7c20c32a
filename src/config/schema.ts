/** Current shape of a package's `[package.metadata.cargo-feature-combinations]` table. */
export interface FeatureCombinationsConfig {
  /** Groups whose combinations are explored independently of each other. */
  isolated_feature_sets: string[][];
  exclude_features: string[];
  /** Pinned into every generated combination. */
  include_features: string[];
  /** Combinations that contain all features of any entry are dropped. */
  exclude_feature_sets: string[][];
  /** Always added back after filtering, minus undeclared features. */
  include_feature_sets: string[][];
  /** When non-empty, exactly these combinations are built. */
  allow_feature_sets: string[][];
  skip_optional_dependencies: boolean;
  no_empty_feature_set: boolean;
  exclude_packages: string[];
  /** Extra fields merged into every `matrix` entry of this package. */
  matrix: Record<string, unknown>;
}

/** Field names accepted by older releases. Only the resolver reads these. */
export interface LegacyConfigFields {
  denylist: string[];
  skip_feature_sets: string[][];
  extra_features: string[];
}

export interface WorkspaceConfig {
  exclude_packages: string[];
}

type ListKey<T> = { [K in keyof T]: T[K] extends string[] ? K : never }[keyof T];
type NestedListKey<T> = { [K in keyof T]: T[K] extends string[][] ? K : never }[keyof T];

export type DeprecatedField =
  | {
      old: ListKey<LegacyConfigFields>;
      replacement: ListKey<FeatureCombinationsConfig>;
      kind: 'set';
    }
  | {
      old: NestedListKey<LegacyConfigFields>;
      replacement: NestedListKey<FeatureCombinationsConfig>;
      kind: 'list';
    };

export const DEPRECATED_FIELDS: readonly DeprecatedField[] = [
  { old: 'denylist', replacement: 'exclude_features', kind: 'set' },
  { old: 'skip_feature_sets', replacement: 'exclude_feature_sets', kind: 'list' },
  { old: 'extra_features', replacement: 'include_features', kind: 'set' },
];

const STRING_LIST_KEYS = ['exclude_features', 'include_features', 'exclude_packages'] as const;
const NESTED_LIST_KEYS = [
  'isolated_feature_sets',
  'exclude_feature_sets',
  'include_feature_sets',
  'allow_feature_sets',
] as const;
const BOOLEAN_KEYS = ['skip_optional_dependencies', 'no_empty_feature_set'] as const;

export function buildDefaultConfig(
  overrides: Partial<FeatureCombinationsConfig> = {},
): FeatureCombinationsConfig {
  return {
    isolated_feature_sets: [],
    exclude_features: [],
    include_features: [],
    exclude_feature_sets: [],
    include_feature_sets: [],
    allow_feature_sets: [],
    skip_optional_dependencies: false,
    no_empty_feature_set: false,
    exclude_packages: [],
    matrix: {},
    ...overrides,
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === 'object' && !Array.isArray(value);
}

export function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isNestedStringList(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(isStringList);
}

export interface ParsedConfigDocument {
  errors: string[];
  warnings: string[];
  config: FeatureCombinationsConfig;
  legacy: Partial<LegacyConfigFields>;
}

/**
 * Type-check a raw package document field by field. Current and legacy
 * fields are returned separately; merging them is the resolver's job.
 */
export function parseConfigDocument(doc: Record<string, unknown>): ParsedConfigDocument {
  const errors: string[] = [];
  const warnings: string[] = [];
  const config = buildDefaultConfig();
  const legacy: Partial<LegacyConfigFields> = {};

  const known = new Set<string>([
    ...STRING_LIST_KEYS,
    ...NESTED_LIST_KEYS,
    ...BOOLEAN_KEYS,
    'matrix',
    ...DEPRECATED_FIELDS.map((f) => f.old),
  ]);

  for (const key of Object.keys(doc)) {
    if (!known.has(key)) {
      warnings.push(`unknown configuration key \`${key}\``);
    }
  }

  for (const key of STRING_LIST_KEYS) {
    const value = doc[key];
    if (value == null) continue;
    if (isStringList(value)) config[key] = [...value];
    else errors.push(`${key} must be a list of strings`);
  }

  for (const key of NESTED_LIST_KEYS) {
    const value = doc[key];
    if (value == null) continue;
    if (isNestedStringList(value)) config[key] = value.map((set) => [...set]);
    else errors.push(`${key} must be a list of lists of strings`);
  }

  for (const key of BOOLEAN_KEYS) {
    const value = doc[key];
    if (value == null) continue;
    if (typeof value === 'boolean') config[key] = value;
    else errors.push(`${key} must be a boolean (got ${typeof value})`);
  }

  if (doc.matrix != null) {
    if (isRecord(doc.matrix)) config.matrix = { ...doc.matrix };
    else errors.push('matrix must be a table');
  }

  for (const field of DEPRECATED_FIELDS) {
    const value = doc[field.old];
    if (value == null) continue;
    if (field.kind === 'set') {
      if (isStringList(value)) legacy[field.old] = [...value];
      else errors.push(`${field.old} must be a list of strings`);
    } else if (isNestedStringList(value)) {
      legacy[field.old] = value.map((set) => [...set]);
    } else {
      errors.push(`${field.old} must be a list of lists of strings`);
    }
  }

  return { errors, warnings, config, legacy };
}

export function parseWorkspaceDocument(doc: Record<string, unknown>): {
  errors: string[];
  warnings: string[];
  config: WorkspaceConfig;
} {
  const errors: string[] = [];
  const warnings: string[] = [];
  const config: WorkspaceConfig = { exclude_packages: [] };

  for (const key of Object.keys(doc)) {
    if (key !== 'exclude_packages') warnings.push(`unknown workspace configuration key \`${key}\``);
  }

  if (doc.exclude_packages != null) {
    if (isStringList(doc.exclude_packages)) config.exclude_packages = [...doc.exclude_packages];
    else errors.push('exclude_packages must be a list of strings');
  }

  return { errors, warnings, config };
}
