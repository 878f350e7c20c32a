export type FeatureCombinationsErrorCode =
  | 'CONFIG_INVALID'
  | 'TOO_MANY_CONFIGURATIONS'
  | 'MANIFEST_PATH'
  | 'METADATA_FAILED';

/**
 * Base class for failures raised before or between builds. A failing build is
 * not an error; it is recorded as a run outcome instead.
 */
export class FeatureCombinationsError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: FeatureCombinationsErrorCode;

  constructor(message: string, code: FeatureCombinationsErrorCode) {
    super(message);
    this.name = 'FeatureCombinationsError';
    this.code = code;
  }
}

export class ConfigError extends FeatureCombinationsError {
  /** Individual validation problems, one per offending field. */
  public readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class TooManyConfigurationsError extends FeatureCombinationsError {
  constructor(
    readonly packageName: string,
    readonly combinations: number,
    readonly limit: number,
  ) {
    super(
      `too many configurations for package ${packageName}: ${combinations} feature combinations ` +
        `exceed the limit of ${limit} (use isolated_feature_sets or exclude_features)`,
      'TOO_MANY_CONFIGURATIONS',
    );
    this.name = 'TooManyConfigurationsError';
  }
}

export class ManifestPathError extends FeatureCombinationsError {
  constructor(readonly manifestPath: string) {
    super(`could not find parent dir of package manifest "${manifestPath}"`, 'MANIFEST_PATH');
    this.name = 'ManifestPathError';
  }
}

export class MetadataError extends FeatureCombinationsError {
  constructor(message: string) {
    super(message, 'METADATA_FAILED');
    this.name = 'MetadataError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
