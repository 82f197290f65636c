import { VersionSet } from '../version-set.js';
import type { PackageIdentity } from '../../types/index.js';

export type TermRelation = 'satisfied' | 'contradicted' | 'inconclusive';

/**
 * A statement about one package: its selected version is (positive) or is
 * not (negative) within `versions`. A negative term also holds when the
 * package is not selected at all.
 */
export class Term {
  constructor(
    readonly identity: PackageIdentity,
    readonly versions: VersionSet,
    readonly positive: boolean
  ) {}

  inverse(): Term {
    return new Term(this.identity, this.versions, !this.positive);
  }

  /**
   * Both terms hold. Mixed polarity yields a positive term; an empty
   * positive term is a contradiction.
   */
  intersect(other: Term): Term {
    if (other.identity !== this.identity) {
      throw new Error(`Cannot intersect terms for ${this.identity} and ${other.identity}`);
    }
    if (this.positive && other.positive) {
      return new Term(this.identity, this.versions.intersect(other.versions), true);
    }
    if (this.positive) {
      return new Term(this.identity, this.versions.difference(other.versions), true);
    }
    if (other.positive) {
      return new Term(this.identity, other.versions.difference(this.versions), true);
    }
    return new Term(this.identity, this.versions.union(other.versions), false);
  }

  /** This term holds and `other` does not; undefined when that is impossible */
  difference(other: Term): Term | undefined {
    const result = this.intersect(other.inverse());
    return result.versions.isEmpty() ? undefined : result;
  }

  isEmpty(): boolean {
    return this.positive && this.versions.isEmpty();
  }

  /**
   * How `other` fares if this term is everything known about the package
   */
  relation(other: Term): TermRelation {
    const both = this.intersect(other);
    if (both.equals(this)) return 'satisfied';
    if (both.isEmpty()) return 'contradicted';
    return 'inconclusive';
  }

  satisfies(other: Term): boolean {
    return this.relation(other) === 'satisfied';
  }

  equals(other: Term): boolean {
    return this.identity === other.identity
      && this.positive === other.positive
      && this.versions.equals(other.versions);
  }

  toString(): string {
    const versions = this.versions.isAny() ? '' : ` ${this.versions.toString()}`;
    return `${this.positive ? '' : 'not '}${this.identity}${versions}`;
  }
}
