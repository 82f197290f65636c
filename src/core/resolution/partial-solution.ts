import type { PackageIdentity } from '../../types/index.js';
import { VersionSet } from '../version-set.js';
import type { Incompatibility } from './incompatibility.js';
import { Term, type TermRelation } from './term.js';

export interface Assignment {
  term: Term;
  decisionLevel: number;
  /** Position in the assignment log */
  index: number;
  /** Set for derivations; decisions have none */
  cause?: Incompatibility;
}

/**
 * The solver's current knowledge: an append-only log of decisions and
 * derivations. Backtracking truncates the log to a decision level.
 */
export class PartialSolution {
  private readonly assignments: Assignment[] = [];
  private readonly decisions = new Map<PackageIdentity, string>();
  /** Intersection of every assignment per package */
  private readonly accumulated = new Map<PackageIdentity, Term>();

  get decisionLevel(): number {
    return this.decisions.size;
  }

  decide(identity: PackageIdentity, version: string): void {
    this.decisions.set(identity, version);
    this.assign({
      term: new Term(identity, VersionSet.exact(version), true),
      decisionLevel: this.decisionLevel,
      index: this.assignments.length
    });
  }

  derive(term: Term, cause: Incompatibility): void {
    this.assign({ term, decisionLevel: this.decisionLevel, index: this.assignments.length, cause });
  }

  /**
   * Remove every assignment made after `decisionLevel`
   */
  backtrack(decisionLevel: number): void {
    const touched = new Set<PackageIdentity>();
    while (this.assignments.length > 0 && this.assignments[this.assignments.length - 1].decisionLevel > decisionLevel) {
      const removed = this.assignments.pop();
      if (!removed) break;
      touched.add(removed.term.identity);
      if (!removed.cause) {
        this.decisions.delete(removed.term.identity);
      }
    }

    for (const identity of touched) {
      this.accumulated.delete(identity);
    }
    for (const assignment of this.assignments) {
      if (touched.has(assignment.term.identity)) {
        this.accumulate(assignment.term);
      }
    }
  }

  relation(term: Term): TermRelation {
    const known = this.accumulated.get(term.identity);
    return known ? known.relation(term) : 'inconclusive';
  }

  satisfies(term: Term): boolean {
    return this.relation(term) === 'satisfied';
  }

  /**
   * The earliest assignment after which the log satisfies `term`
   */
  satisfier(term: Term): Assignment {
    let known: Term | undefined;
    for (const assignment of this.assignments) {
      if (assignment.term.identity !== term.identity) continue;
      known = known ? known.intersect(assignment.term) : assignment.term;
      if (known.satisfies(term)) return assignment;
    }
    throw new Error(`No assignment satisfies ${term.toString()}`);
  }

  /** Positive terms for packages that have not been decided yet, ordered by identity */
  unsatisfied(): Term[] {
    return [...this.accumulated.values()]
      .filter(term => term.positive && !this.decisions.has(term.identity))
      .sort((a, b) => (a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0));
  }

  /** Decisions in the order they were made */
  decided(): Array<[PackageIdentity, string]> {
    return [...this.decisions.entries()];
  }

  private assign(assignment: Assignment): void {
    this.assignments.push(assignment);
    this.accumulate(assignment.term);
  }

  private accumulate(term: Term): void {
    const known = this.accumulated.get(term.identity);
    this.accumulated.set(term.identity, known ? known.intersect(term) : term);
  }
}
