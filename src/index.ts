export { run } from './cli/index.js';
export {
  FeatureCombinationsError,
  ConfigError,
  TooManyConfigurationsError,
  ManifestPathError,
  MetadataError,
} from './errors.js';
export type { FeatureCombinationsErrorCode } from './errors.js';
export { FeatureSet, sortFeatureSets } from './features/feature-set.js';
export {
  eligibleFeatures,
  featureMatrix,
  generateFeatureSets,
  optionalDependencyFeatures,
} from './features/combinations.js';
export * from './config/index.js';
export { loadCargoWorkspace, parseCargoMetadata } from './metadata/index.js';
export type { CargoWorkspace, DependencyDescriptor, PackageDescriptor } from './metadata/index.js';
export { planRuns, runFeatureCombinations } from './runner/orchestrator.js';
export type { BuildProcess, PlannedPackage, RunOptions, RunReport, SpawnFn } from './runner/orchestrator.js';
export type { RunOutcome } from './runner/outcome.js';
export { countDiagnostics } from './runner/diagnostics.js';
export { formatSummary, printSummary, summaryExitCode } from './summary/format.js';
export { buildMatrix, formatMatrix } from './matrix/index.js';
export type { MatrixEntry, MatrixSource } from './matrix/index.js';
export { createLogger } from './logging/index.js';
export type { Logger, LogEntry } from './logging/index.js';
