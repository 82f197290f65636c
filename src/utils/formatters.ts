import type { Solution } from '../core/resolution/types.js';
import type { PackageGraph } from '../core/graph/package-graph.js';
import { describeBinding } from '../core/requirement.js';

/**
 * One line per resolved package, identities padded to a column:
 *
 *   core    1.4.0
 *   logging main (4f2a9c1)
 */
export function formatSolution(solution: Solution): string[] {
  const width = Math.max(0, ...solution.packages.map(entry => entry.identity.length));
  return solution.packages.map(entry => `${entry.identity.padEnd(width)} ${describeBinding(entry.binding)}`);
}

/**
 * Modules each root target needs, dependency-first, as an indented list.
 * When `onlyTarget` is set, only that root target is listed.
 */
export function formatModules(graph: PackageGraph, onlyTarget?: string): string[] {
  const lines: string[] = [];
  for (const target of graph.rootTargets) {
    if (onlyTarget !== undefined && target !== onlyTarget) continue;
    lines.push(`${target}:`);
    for (const module of graph.modulesFor(target) ?? []) {
      lines.push(`  ${module}`);
    }
  }
  return lines;
}
