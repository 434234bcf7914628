/**
 * Build options and build requirements.
 *
 * Both vocabularies are ordered: the position of a value in its list is its
 * bit index, so iteration, export and the integer form are all derived from
 * the same declaration order.
 */

export const BUILD_OPTIONS = [
  'debugMode',
  'releaseMode',
  'coverage',
  'debugInfo',
  'debugInfoC',
  'alwaysStackFrame',
  'stackStomping',
  'inline',
  'noBoundsCheck',
  'optimize',
  'profile',
  'unittests',
  'verbose',
  'ignoreUnknownPragmas',
  'syntaxOnly',
  'warnings',
  'warningsAsErrors',
  'ignoreDeprecations',
  'deprecationWarnings',
  'deprecationErrors',
  'property',
  'profileGC',
  'pic',
  'betterC',
  '_docs',
  '_ddox'
] as const;

export const BUILD_REQUIREMENTS = [
  'allowWarnings',
  'silenceWarnings',
  'disallowDeprecations',
  'silenceDeprecations',
  'disallowInlining',
  'disallowOptimization',
  'requireBoundsCheck',
  'requireContracts',
  'relaxProperties',
  'noDefaultFlags'
] as const;

export type BuildOption = typeof BUILD_OPTIONS[number];
export type BuildRequirement = typeof BUILD_REQUIREMENTS[number];

export function isBuildOption(value: string): value is BuildOption {
  return (BUILD_OPTIONS as readonly string[]).includes(value);
}

export function isBuildRequirement(value: string): value is BuildRequirement {
  return (BUILD_REQUIREMENTS as readonly string[]).includes(value);
}

/**
 * Set of enum values that always iterates in vocabulary order.
 */
export class FlagSet<T extends string> implements Iterable<T> {
  private readonly members = new Set<T>();

  constructor(private readonly vocabulary: readonly T[], values: Iterable<T> = []) {
    for (const value of values) {
      this.members.add(value);
    }
  }

  add(...values: T[]): this {
    for (const value of values) {
      this.members.add(value);
    }
    return this;
  }

  remove(...values: T[]): this {
    for (const value of values) {
      this.members.delete(value);
    }
    return this;
  }

  has(value: T): boolean {
    return this.members.has(value);
  }

  get size(): number {
    return this.members.size;
  }

  /**
   * Members in increasing bit order
   */
  values(): T[] {
    return this.vocabulary.filter(value => this.members.has(value));
  }

  [Symbol.iterator](): Iterator<T> {
    return this.values()[Symbol.iterator]();
  }

  toMask(): number {
    let mask = 0;
    this.vocabulary.forEach((value, index) => {
      if (this.members.has(value)) {
        mask |= 1 << index;
      }
    });
    return mask;
  }

  clone(): FlagSet<T> {
    return new FlagSet(this.vocabulary, this.members);
  }

  equals(other: FlagSet<T>): boolean {
    return this.toMask() === other.toMask();
  }
}

export type BuildOptions = FlagSet<BuildOption>;
export type BuildRequirements = FlagSet<BuildRequirement>;

export function createBuildOptions(values: Iterable<BuildOption> = []): BuildOptions {
  return new FlagSet<BuildOption>(BUILD_OPTIONS, values);
}

export function createBuildRequirements(values: Iterable<BuildRequirement> = []): BuildRequirements {
  return new FlagSet<BuildRequirement>(BUILD_REQUIREMENTS, values);
}
