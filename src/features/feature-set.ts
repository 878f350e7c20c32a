/**
 * An immutable, sorted, deduplicated set of feature names. One FeatureSet is
 * one build configuration.
 */
export class FeatureSet {
  static readonly EMPTY = new FeatureSet([]);

  private readonly names: readonly string[];
  /** Identity used for deduplication in maps. */
  readonly key: string;

  private constructor(sorted: readonly string[]) {
    this.names = sorted;
    this.key = JSON.stringify(sorted);
  }

  static of(names: Iterable<string>): FeatureSet {
    const sorted = [...new Set(names)].sort(compareNames);
    return sorted.length === 0 ? FeatureSet.EMPTY : new FeatureSet(sorted);
  }

  get members(): readonly string[] {
    return this.names;
  }

  get size(): number {
    return this.names.length;
  }

  isEmpty(): boolean {
    return this.names.length === 0;
  }

  has(name: string): boolean {
    return this.names.includes(name);
  }

  /** True when every member of this set is a member of `other`. */
  isSubsetOf(other: FeatureSet): boolean {
    return this.names.every((name) => other.has(name));
  }

  union(names: Iterable<string>): FeatureSet {
    return FeatureSet.of([...this.names, ...names]);
  }

  /** Keep only members accepted by `predicate`. */
  filter(predicate: (name: string) => boolean): FeatureSet {
    return FeatureSet.of(this.names.filter(predicate));
  }

  equals(other: FeatureSet): boolean {
    return this.key === other.key;
  }

  /** Lexicographic over the sorted member lists; a proper prefix sorts first. */
  compare(other: FeatureSet): number {
    const len = Math.min(this.names.length, other.names.length);
    for (let i = 0; i < len; i++) {
      const order = compareNames(this.names[i], other.names[i]);
      if (order !== 0) return order;
    }
    return this.names.length - other.names.length;
  }

  /** Comma-joined form passed to `--features=` and emitted in matrix JSON. */
  toString(): string {
    return this.names.join(',');
  }

  /** Human-readable form used in status and summary lines. */
  display(): string {
    return this.names.join(', ');
  }
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Deduplicate by value and sort into canonical order. */
export function sortFeatureSets(sets: Iterable<FeatureSet>): FeatureSet[] {
  const unique = new Map<string, FeatureSet>();
  for (const set of sets) unique.set(set.key, set);
  return [...unique.values()].sort((a, b) => a.compare(b));
}
