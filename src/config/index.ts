export {
  type FeatureCombinationsConfig,
  type LegacyConfigFields,
  type WorkspaceConfig,
  DEPRECATED_FIELDS,
  buildDefaultConfig,
  parseConfigDocument,
  parseWorkspaceDocument,
} from './schema.js';

export {
  type Resolution,
  type PackageSelection,
  migrateLegacyFields,
  resolveConfig,
  resolveWorkspaceConfig,
  selectPackages,
} from './resolver.js';

export {
  type ConfigOverrides,
  deepMerge,
  loadOverrides,
  parseOverrides,
  packageDocument,
  workspaceDocument,
} from './loader.js';
