import { ROOT_IDENTITY } from '../../constants/index.js';
import { describeRequirement } from '../requirement.js';
import type { Incompatibility } from './incompatibility.js';
import type { Term } from './term.js';

/**
 * Renders the derivation of a failed resolution as numbered prose:
 *
 *   Because a 1.0.0 depends on c >=1.0.0 <2.0.0 and b 1.0.0 depends on c >=2.0.0 <3.0.0,
 *     a 1.0.0 is incompatible with b 1.0.0.
 *   ...
 *   So, because app depends on a and app depends on b, version solving failed.
 *
 * Derived incompatibilities referenced more than once get a line number so
 * later lines can cite them instead of repeating their derivation.
 */
export function explainFailure(failure: Incompatibility, rootName: string): string {
  return new ExplanationWriter(failure, rootName).write();
}

interface Line {
  message: string;
  number?: number;
}

class ExplanationWriter {
  private readonly derivations = new Map<Incompatibility, number>();
  private readonly lines: Line[] = [];
  private readonly lineNumbers = new Map<Incompatibility, number>();

  constructor(
    private readonly root: Incompatibility,
    private readonly rootName: string
  ) {
    this.countDerivations(root);
  }

  write(): string {
    if (this.root.cause.kind === 'derived') {
      this.visit(this.root, false);
    } else {
      this.record(this.root, `Because ${this.describe(this.root)}, version solving failed.`, false);
    }

    const numbers = [...this.lineNumbers.values()];
    const padding = numbers.length === 0 ? 0 : `(${numbers[numbers.length - 1]}) `.length;
    const output: string[] = [];
    let lastWasEmpty = false;
    for (const line of this.lines) {
      if (line.message.length === 0) {
        if (!lastWasEmpty) output.push('');
        lastWasEmpty = true;
        continue;
      }
      lastWasEmpty = false;
      const prefix = line.number === undefined ? ' '.repeat(padding) : `(${line.number})`.padEnd(padding);
      output.push(prefix + line.message);
    }
    return output.join('\n');
  }

  private countDerivations(incompatibility: Incompatibility): void {
    const count = this.derivations.get(incompatibility);
    if (count !== undefined) {
      this.derivations.set(incompatibility, count + 1);
      return;
    }
    this.derivations.set(incompatibility, 1);
    if (incompatibility.cause.kind === 'derived') {
      this.countDerivations(incompatibility.cause.conflict);
      this.countDerivations(incompatibility.cause.other);
    }
  }

  private record(incompatibility: Incompatibility, message: string, numbered: boolean): void {
    if (numbered) {
      const number = this.lineNumbers.size + 1;
      this.lineNumbers.set(incompatibility, number);
      this.lines.push({ message, number });
    } else {
      this.lines.push({ message });
    }
  }

  private visit(incompatibility: Incompatibility, conclusion: boolean): void {
    if (incompatibility.cause.kind !== 'derived') return;

    const numbered = conclusion || (this.derivations.get(incompatibility) ?? 0) > 1;
    const conjunction = conclusion || incompatibility === this.root ? 'So,' : 'And';
    const text = this.describe(incompatibility);
    const { conflict, other } = incompatibility.cause;

    if (conflict.isDerived && other.isDerived) {
      const conflictLine = this.lineNumbers.get(conflict);
      const otherLine = this.lineNumbers.get(other);

      if (conflictLine !== undefined && otherLine !== undefined) {
        this.record(
          incompatibility,
          `Because ${this.and(conflict, other, conflictLine, otherLine)}, ${text}.`,
          numbered
        );
      } else if (conflictLine !== undefined || otherLine !== undefined) {
        const [withLine, withoutLine] = conflictLine !== undefined ? [conflict, other] : [other, conflict];
        const line = conflictLine ?? otherLine;
        this.visit(withoutLine, false);
        this.record(
          incompatibility,
          `${conjunction} because ${this.describe(withLine)} (${line}), ${text}.`,
          numbered
        );
      } else if (this.isSingleLine(conflict) || this.isSingleLine(other)) {
        const [first, second] = this.isSingleLine(other) ? [conflict, other] : [other, conflict];
        this.visit(first, false);
        this.visit(second, false);
        this.record(incompatibility, `Thus, ${text}.`, numbered);
      } else {
        this.visit(conflict, true);
        this.lines.push({ message: '' });
        this.visit(other, false);
        this.record(
          incompatibility,
          `${conjunction} because ${this.describe(conflict)} (${this.lineNumbers.get(conflict) ?? 0}), ${text}.`,
          numbered
        );
      }
      return;
    }

    if (conflict.isDerived || other.isDerived) {
      const [derived, external] = conflict.isDerived ? [conflict, other] : [other, conflict];
      const derivedLine = this.lineNumbers.get(derived);

      if (derivedLine !== undefined) {
        this.record(
          incompatibility,
          `Because ${this.and(external, derived, undefined, derivedLine)}, ${text}.`,
          numbered
        );
      } else if (this.isCollapsible(derived) && derived.cause.kind === 'derived') {
        const inner = derived.cause;
        const [collapsedDerived, collapsedExternal] = inner.conflict.isDerived
          ? [inner.conflict, inner.other]
          : [inner.other, inner.conflict];
        this.visit(collapsedDerived, false);
        this.record(
          incompatibility,
          `${conjunction} because ${this.and(collapsedExternal, external)}, ${text}.`,
          numbered
        );
      } else {
        this.visit(derived, false);
        this.record(
          incompatibility,
          `${conjunction} because ${this.describe(external)}, ${text}.`,
          numbered
        );
      }
      return;
    }

    this.record(incompatibility, `Because ${this.and(conflict, other)}, ${text}.`, numbered);
  }

  /** Both causes of a derived incompatibility are external */
  private isSingleLine(incompatibility: Incompatibility): boolean {
    const cause = incompatibility.cause;
    return cause.kind === 'derived' && !cause.conflict.isDerived && !cause.other.isDerived;
  }

  /**
   * A derivation used once, from one external and one derived cause whose
   * derived side has no line yet, can be folded into the sentence that uses it.
   */
  private isCollapsible(incompatibility: Incompatibility): boolean {
    if ((this.derivations.get(incompatibility) ?? 0) > 1) return false;
    const cause = incompatibility.cause;
    if (cause.kind !== 'derived') return false;
    if (cause.conflict.isDerived === cause.other.isDerived) return false;
    const complex = cause.conflict.isDerived ? cause.conflict : cause.other;
    return !this.lineNumbers.has(complex);
  }

  private and(left: Incompatibility, right: Incompatibility, leftLine?: number, rightLine?: number): string {
    const leftText = leftLine === undefined ? this.describe(left) : `${this.describe(left)} (${leftLine})`;
    const rightText = rightLine === undefined ? this.describe(right) : `${this.describe(right)} (${rightLine})`;
    return `${leftText} and ${rightText}`;
  }

  private term(term: Term): string {
    if (term.identity === ROOT_IDENTITY) return this.rootName;
    return term.versions.isAny() ? term.identity : `${term.identity} ${term.versions.toString()}`;
  }

  describe(incompatibility: Incompatibility): string {
    const cause = incompatibility.cause;
    const terms = incompatibility.terms;

    switch (cause.kind) {
      case 'root':
        return `${this.rootName} is required`;
      case 'dependency': {
        const depender = terms.find(term => term.positive);
        const dependency = terms.find(term => !term.positive);
        if (depender && dependency) {
          return `${cause.depender ?? this.term(depender)} depends on ${this.term(dependency.inverse())}`;
        }
        break;
      }
      case 'no-versions': {
        const [term] = terms;
        if (term) {
          return term.versions.isAny()
            ? `no versions of ${term.identity} exist`
            : `no versions of ${term.identity} match ${term.versions.toString()}`;
        }
        break;
      }
      case 'unusable-manifest': {
        const [term] = terms;
        if (term) return `${this.term(term)} has an unusable manifest`;
        break;
      }
      case 'unversioned-dependency': {
        const [term] = terms;
        if (term) {
          return `${this.term(term)} depends on ${cause.dependency} at ${describeRequirement(cause.requirement)}, which only the root package may require`;
        }
        break;
      }
      case 'derived':
        break;
    }

    return this.describeTerms(incompatibility);
  }

  private describeTerms(incompatibility: Incompatibility): string {
    if (incompatibility.isFailure()) return 'version solving failed';

    const positive = incompatibility.terms.filter(term => term.positive);
    const negative = incompatibility.terms.filter(term => !term.positive);

    if (incompatibility.terms.length === 1) {
      const [term] = incompatibility.terms;
      return term.positive
        ? `${this.term(term)} is forbidden`
        : `${this.term(term.inverse())} is required`;
    }

    if (positive.length === 1 && negative.length === 1) {
      return `${this.term(positive[0])} requires ${this.term(negative[0].inverse())}`;
    }

    if (negative.length === 0) {
      if (positive.length === 2) {
        return `${this.term(positive[0])} is incompatible with ${this.term(positive[1])}`;
      }
      return `one of ${positive.map(term => this.term(term)).join(' or ')} must be false`;
    }

    const required = negative.map(term => this.term(term.inverse())).join(' or ');
    if (positive.length === 0) {
      return `either ${required} is required`;
    }
    return `if ${positive.map(term => this.term(term)).join(' and ')} then ${required}`;
  }
}
