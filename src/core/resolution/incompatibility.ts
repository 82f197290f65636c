import type { PackageIdentity, UnversionedRequirement } from '../../types/index.js';
import { ROOT_IDENTITY } from '../../constants/index.js';
import { Term } from './term.js';

export type IncompatibilityCause =
  /** The root package must be selected */
  | { kind: 'root' }
  /** A package version (or the root, or a root-bound unversioned package named by `depender`) depends on another package */
  | { kind: 'dependency'; depender?: string }
  /** No published version lies within the term */
  | { kind: 'no-versions' }
  /** The manifest of this version could not be read */
  | { kind: 'unusable-manifest'; message: string }
  /** A versioned package depends on a branch, revision or path the root does not bind */
  | { kind: 'unversioned-dependency'; dependency: PackageIdentity; requirement: UnversionedRequirement }
  /** Derived from two earlier incompatibilities by the resolution rule */
  | { kind: 'derived'; conflict: Incompatibility; other: Incompatibility };

/**
 * A set of terms that cannot all hold at once.
 */
export class Incompatibility {
  readonly terms: readonly Term[];

  constructor(terms: Term[], readonly cause: IncompatibilityCause) {
    // A derived incompatibility that also names other packages says nothing
    // extra by requiring the root; drop it so explanations stay short.
    const filtered = cause.kind === 'derived' && terms.length > 1 && terms.some(isPositiveRoot)
      ? terms.filter(term => !isPositiveRoot(term))
      : terms;

    const merged = new Map<PackageIdentity, Term>();
    for (const term of filtered) {
      const existing = merged.get(term.identity);
      merged.set(term.identity, existing ? existing.intersect(term) : term);
    }
    this.terms = [...merged.values()];
  }

  get isDerived(): boolean {
    return this.cause.kind === 'derived';
  }

  /** Nothing can be selected, or only the root is named */
  isFailure(): boolean {
    return this.terms.length === 0
      || (this.terms.length === 1 && isPositiveRoot(this.terms[0]));
  }

  toString(): string {
    return `{${this.terms.map(term => term.toString()).join(', ')}}`;
  }
}

function isPositiveRoot(term: Term): boolean {
  return term.positive && term.identity === ROOT_IDENTITY;
}

/**
 * The external (non-derived) incompatibilities a derivation rests on, in
 * first-visit order.
 */
export function externalCauses(incompatibility: Incompatibility): Incompatibility[] {
  const seen = new Set<Incompatibility>();
  const result: Incompatibility[] = [];
  const stack: Incompatibility[] = [incompatibility];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current || seen.has(current)) continue;
    seen.add(current);
    if (current.cause.kind === 'derived') {
      stack.push(current.cause.other, current.cause.conflict);
    } else {
      result.push(current);
    }
  }
  return result;
}
