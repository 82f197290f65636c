import type { Requirement, RequirementKind } from '../../types/index.js';
import { compareIdentities } from '../../utils/package-identity.js';
import { bindingKey } from '../requirement.js';
import type { Solution, SolutionEntry } from './types.js';

export function createSolution(entries: SolutionEntry[]): Solution {
  const packages = [...entries]
    .sort((a, b) => compareIdentities(a.identity, b.identity))
    .map(entry => Object.freeze({ ...entry }));
  return Object.freeze({ packages: Object.freeze(packages) });
}

/**
 * The requirement kind recorded for a version binding: `exact` when any
 * incoming requirement is exact, otherwise `range`.
 */
export function versionedRequirementKind(incoming: readonly Requirement[]): RequirementKind {
  return incoming.some(requirement => requirement.kind === 'exact') ? 'exact' : 'range';
}

export function solutionsEqual(a: Solution, b: Solution): boolean {
  if (a.packages.length !== b.packages.length) return false;
  return a.packages.every((entry, i) => {
    const other = b.packages[i];
    return entry.identity === other.identity
      && entry.requirementKind === other.requirementKind
      && bindingKey(entry.binding) === bindingKey(other.binding);
  });
}
