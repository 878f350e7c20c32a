export interface DependencyDescriptor {
  name: string;
  /** Name the dependency is imported under, when renamed in the manifest. */
  rename: string | null;
  optional: boolean;
}

export interface PackageDescriptor {
  name: string;
  /** Path of the package's Cargo.toml; its directory is the build's working dir. */
  manifestPath: string;
  /** Feature name -> features and dependencies it enables. */
  features: Record<string, string[]>;
  dependencies: DependencyDescriptor[];
  /** The package's `[package.metadata]` table, if any. */
  metadata: Record<string, unknown> | null;
}

export interface CargoWorkspace {
  root: string;
  targetDirectory: string;
  /** Name of the package whose manifest is the workspace root manifest. */
  rootPackage: string | null;
  /** The `[workspace.metadata]` table, if any. */
  metadata: Record<string, unknown> | null;
  packages: PackageDescriptor[];
}
