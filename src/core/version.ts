/**
 * Package version values.
 *
 * A version is either a semantic version (`1.2.3`, `1.2.3+commit.4.gabc`),
 * a branch (`~master`, `~feature-x`) or the `unknown` marker.
 */

import semver from 'semver';

const UNKNOWN = 'unknown';
const MASTER_BRANCH = '~master';

export class Version {
  static readonly unknown = new Version(UNKNOWN);
  static readonly masterBranch = new Version(MASTER_BRANCH);

  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Whether `value` is a valid semantic version (build metadata allowed)
   */
  static isValid(value: string): boolean {
    return semver.valid(value) !== null && !value.startsWith('v') && !value.startsWith('=');
  }

  get isUnknown(): boolean {
    return this.value === UNKNOWN;
  }

  get isBranch(): boolean {
    return this.value.startsWith('~');
  }

  get isMaster(): boolean {
    return this.value === MASTER_BRANCH;
  }

  get isEmpty(): boolean {
    return this.value.length === 0;
  }

  equals(other: Version | string): boolean {
    return this.value === (typeof other === 'string' ? other : other.value);
  }

  /**
   * Ordering: branches first, then releases by semver precedence,
   * unknown last. Build metadata breaks ties lexically so the order is total.
   */
  compare(other: Version): number {
    if (this.value === other.value) return 0;
    if (this.isUnknown) return 1;
    if (other.isUnknown) return -1;
    if (this.isBranch || other.isBranch) {
      if (this.isBranch && other.isBranch) return this.value < other.value ? -1 : 1;
      return this.isBranch ? -1 : 1;
    }
    if (!Version.isValid(this.value) || !Version.isValid(other.value)) {
      return this.value < other.value ? -1 : 1;
    }
    const precedence = semver.compare(this.value, other.value);
    if (precedence !== 0) return precedence;
    return this.value < other.value ? -1 : 1;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
