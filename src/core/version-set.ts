import * as semver from 'semver';

/**
 * Version set algebra over semver versions.
 *
 * A VersionSet is an ordered union of disjoint, non-adjacent intervals.
 * Every operation returns a normalized set, so structural equality is set equality.
 */

export interface VersionBound {
  version: string;
  inclusive: boolean;
}

export interface VersionInterval {
  /** Missing lower bound means unbounded below */
  lower?: VersionBound;
  /** Missing upper bound means unbounded above */
  upper?: VersionBound;
}

function compareVersions(a: string, b: string): number {
  return semver.compare(a, b);
}

function compareLower(a: VersionBound | undefined, b: VersionBound | undefined): number {
  if (!a && !b) return 0;
  if (!a) return -1;
  if (!b) return 1;
  const cmp = compareVersions(a.version, b.version);
  if (cmp !== 0) return cmp;
  if (a.inclusive === b.inclusive) return 0;
  return a.inclusive ? -1 : 1;
}

function compareUpper(a: VersionBound | undefined, b: VersionBound | undefined): number {
  if (!a && !b) return 0;
  if (!a) return 1;
  if (!b) return -1;
  const cmp = compareVersions(a.version, b.version);
  if (cmp !== 0) return cmp;
  if (a.inclusive === b.inclusive) return 0;
  return a.inclusive ? 1 : -1;
}

function isEmptyInterval(interval: VersionInterval): boolean {
  const { lower, upper } = interval;
  if (!lower || !upper) return false;
  const cmp = compareVersions(lower.version, upper.version);
  if (cmp > 0) return true;
  return cmp === 0 && !(lower.inclusive && upper.inclusive);
}

/** True when `next` (which starts at or after `current`) overlaps or touches `current`. */
function touches(current: VersionInterval, next: VersionInterval): boolean {
  if (!current.upper || !next.lower) return true;
  const cmp = compareVersions(next.lower.version, current.upper.version);
  if (cmp < 0) return true;
  return cmp === 0 && (current.upper.inclusive || next.lower.inclusive);
}

function normalize(intervals: VersionInterval[]): VersionInterval[] {
  const sorted = intervals
    .filter(interval => !isEmptyInterval(interval))
    .sort((a, b) => compareLower(a.lower, b.lower));

  const merged: VersionInterval[] = [];
  for (const interval of sorted) {
    const last = merged[merged.length - 1];
    if (last && touches(last, interval)) {
      merged[merged.length - 1] = {
        lower: last.lower,
        upper: compareUpper(last.upper, interval.upper) >= 0 ? last.upper : interval.upper
      };
    } else {
      merged.push(interval);
    }
  }
  return merged;
}

function admitsPrerelease(version: semver.SemVer, bound: VersionBound | undefined): boolean {
  const boundVersion = bound ? semver.parse(bound.version) : null;
  return boundVersion !== null
    && boundVersion.prerelease.length > 0
    && boundVersion.major === version.major
    && boundVersion.minor === version.minor
    && boundVersion.patch === version.patch;
}

function sameBound(a: VersionBound | undefined, b: VersionBound | undefined): boolean {
  if (!a || !b) return a === b;
  return a.inclusive === b.inclusive && compareVersions(a.version, b.version) === 0;
}

function formatInterval(interval: VersionInterval): string {
  const { lower, upper } = interval;
  if (lower && upper && lower.inclusive && upper.inclusive && compareVersions(lower.version, upper.version) === 0) {
    return lower.version;
  }
  const parts: string[] = [];
  if (lower) parts.push(`${lower.inclusive ? '>=' : '>'}${lower.version}`);
  if (upper) parts.push(`${upper.inclusive ? '<=' : '<'}${upper.version}`);
  return parts.length > 0 ? parts.join(' ') : 'any';
}

export class VersionSet {
  private static readonly EMPTY = new VersionSet([]);
  private static readonly ANY = new VersionSet([{}]);

  private constructor(readonly intervals: readonly VersionInterval[]) {}

  static empty(): VersionSet {
    return VersionSet.EMPTY;
  }

  static any(): VersionSet {
    return VersionSet.ANY;
  }

  static exact(version: string): VersionSet {
    return VersionSet.between({ version, inclusive: true }, { version, inclusive: true });
  }

  static between(lower?: VersionBound, upper?: VersionBound): VersionSet {
    return VersionSet.of([{ lower, upper }]);
  }

  static of(intervals: VersionInterval[]): VersionSet {
    const normalized = normalize(intervals);
    if (normalized.length === 0) return VersionSet.EMPTY;
    return new VersionSet(normalized);
  }

  /**
   * Build a set from a semver range string such as `^1.2.0`, `>=1.0.0 <2.0.0` or `1.x || 3.0.0`.
   * Returns undefined for strings semver cannot parse.
   */
  static fromRange(range: string): VersionSet | undefined {
    let parsed: semver.Range;
    try {
      parsed = new semver.Range(range);
    } catch {
      return undefined;
    }

    let result = VersionSet.empty();
    for (const comparators of parsed.set) {
      let conjunction = VersionSet.any();
      for (const comparator of comparators) {
        conjunction = conjunction.intersect(comparatorToSet(comparator));
      }
      result = result.union(conjunction);
    }
    return result;
  }

  isEmpty(): boolean {
    return this.intervals.length === 0;
  }

  isAny(): boolean {
    return this.intervals.length === 1 && !this.intervals[0].lower && !this.intervals[0].upper;
  }

  /** The single version this set holds, if it is an exact set. */
  singleVersion(): string | undefined {
    if (this.intervals.length !== 1) return undefined;
    const [{ lower, upper }] = this.intervals;
    if (lower && upper && lower.inclusive && upper.inclusive && compareVersions(lower.version, upper.version) === 0) {
      return lower.version;
    }
    return undefined;
  }

  /**
   * Membership as `semver.satisfies` decides it: a prerelease version only
   * belongs to an interval whose own bounds carry a prerelease of the same
   * major.minor.patch, so `>=1.0.0 <2.0.0` holds neither `1.5.0-rc.1` nor
   * `2.0.0-beta.1`.
   */
  contains(version: string): boolean {
    const parsed = semver.parse(version);
    if (!parsed) return false;
    return this.intervals.some(({ lower, upper }) => {
      if (parsed.prerelease.length > 0 && !admitsPrerelease(parsed, lower) && !admitsPrerelease(parsed, upper)) {
        return false;
      }
      if (lower) {
        const cmp = compareVersions(version, lower.version);
        if (cmp < 0 || (cmp === 0 && !lower.inclusive)) return false;
      }
      if (upper) {
        const cmp = compareVersions(version, upper.version);
        if (cmp > 0 || (cmp === 0 && !upper.inclusive)) return false;
      }
      return true;
    });
  }

  union(other: VersionSet): VersionSet {
    if (this.isEmpty()) return other;
    if (other.isEmpty()) return this;
    return VersionSet.of([...this.intervals, ...other.intervals]);
  }

  intersect(other: VersionSet): VersionSet {
    const result: VersionInterval[] = [];
    for (const a of this.intervals) {
      for (const b of other.intervals) {
        const candidate: VersionInterval = {
          lower: compareLower(a.lower, b.lower) >= 0 ? a.lower : b.lower,
          upper: compareUpper(a.upper, b.upper) <= 0 ? a.upper : b.upper
        };
        if (!isEmptyInterval(candidate)) result.push(candidate);
      }
    }
    return VersionSet.of(result);
  }

  complement(): VersionSet {
    const gaps: VersionInterval[] = [];
    let cursor: VersionBound | undefined;
    let open = true;

    for (const interval of this.intervals) {
      if (interval.lower) {
        gaps.push({
          lower: cursor,
          upper: { version: interval.lower.version, inclusive: !interval.lower.inclusive }
        });
      }
      if (!interval.upper) {
        open = false;
        break;
      }
      cursor = { version: interval.upper.version, inclusive: !interval.upper.inclusive };
    }

    if (open) gaps.push({ lower: cursor, upper: undefined });
    return VersionSet.of(gaps);
  }

  difference(other: VersionSet): VersionSet {
    return this.intersect(other.complement());
  }

  isSubsetOf(other: VersionSet): boolean {
    return this.intersect(other).equals(this);
  }

  equals(other: VersionSet): boolean {
    if (this === other) return true;
    if (this.intervals.length !== other.intervals.length) return false;
    return this.intervals.every((interval, i) => {
      const theirs = other.intervals[i];
      return sameBound(interval.lower, theirs.lower) && sameBound(interval.upper, theirs.upper);
    });
  }

  toString(): string {
    if (this.isEmpty()) return 'none';
    return this.intervals.map(formatInterval).join(' || ');
  }
}

/**
 * semver writes exclusive upper bounds of caret and tilde ranges as `<2.0.0-0`.
 * Drop the `-0` so explanations read `<2.0.0`.
 */
function stripZeroPrerelease(version: semver.SemVer): string {
  const prerelease = version.prerelease;
  if (prerelease.length === 1 && prerelease[0] === 0) {
    return `${version.major}.${version.minor}.${version.patch}`;
  }
  return version.version;
}

function comparatorToSet(comparator: semver.Comparator): VersionSet {
  if (comparator.value === '') {
    return VersionSet.any();
  }
  const version = comparator.operator === '<'
    ? stripZeroPrerelease(comparator.semver)
    : comparator.semver.version;
  switch (comparator.operator) {
    case '>=':
      return VersionSet.between({ version, inclusive: true });
    case '>':
      return VersionSet.between({ version, inclusive: false });
    case '<=':
      return VersionSet.between(undefined, { version, inclusive: true });
    case '<':
      return VersionSet.between(undefined, { version, inclusive: false });
    default:
      return VersionSet.exact(version);
  }
}
