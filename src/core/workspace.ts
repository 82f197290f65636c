import type { PackageManifest, Result } from '../types/index.js';
import type { Providers } from './providers/types.js';
import { ProviderCache } from './providers/provider-cache.js';
import { Resolver } from './resolution/solver.js';
import type { ResolutionError, Solution } from './resolution/types.js';
import { PackageGraphBuilder } from './graph/graph-builder.js';
import type { PackageGraph } from './graph/package-graph.js';
import type { GraphError } from './graph/types.js';
import { lockfileFromSolution, readLockfile, writeLockfile, type Lockfile } from './lockfile/lockfile.js';
import { reconcile, type StaleReason } from './lockfile/reconcile.js';
import { logger } from '../utils/logger.js';

export interface LoadPackageGraphOptions {
  providers: Providers;
  /** Lockfile to reconcile against and to write after a full resolution */
  lockfilePath?: string;
  platform?: string;
  signal?: AbortSignal;
  /** Ignore the lockfile: always resolve, and prefer no pinned versions */
  update?: boolean;
}

export interface LoadedWorkspace {
  solution: Solution;
  graph: PackageGraph;
  lockfile: Lockfile;
  /** True when the existing lockfile was reused without solving */
  fastPath: boolean;
  /** Why the existing lockfile could not be reused, when there was one */
  staleReasons: StaleReason[];
  lockfileWritten: boolean;
}

export type WorkspaceError =
  | { stage: 'resolution'; error: ResolutionError }
  | { stage: 'graph'; error: GraphError };

/**
 * Resolution entry point: reconcile the lockfile, resolve when it is stale,
 * build the package graph, then persist a new lockfile.
 *
 * The lockfile is written only after a full resolution whose graph built
 * successfully; a failed or cancelled call leaves it untouched.
 */
export async function loadPackageGraph(
  rootManifest: PackageManifest,
  options: LoadPackageGraphOptions
): Promise<Result<LoadedWorkspace, WorkspaceError>> {
  const { providers, lockfilePath, platform, signal, update = false } = options;
  const cache = new ProviderCache(providers, signal);
  const rootRequirements = rootManifest.dependencies;

  try {
    const existing = lockfilePath ? await readLockfile(lockfilePath) : undefined;

    let solution: Solution | undefined;
    let staleReasons: StaleReason[] = [];
    if (existing && !update) {
      const reconciled = await reconcile(rootRequirements, existing, providers, { cache });
      if (!reconciled.success) {
        return { success: false, error: { stage: 'resolution', error: reconciled.error } };
      }
      if (reconciled.data.kind === 'fresh') {
        logger.info('Lockfile is up to date; skipping resolution');
        solution = reconciled.data.solution;
      } else {
        staleReasons = reconciled.data.reasons;
      }
    }

    const fastPath = solution !== undefined;
    if (!solution) {
      const resolved = await new Resolver(providers).resolve(rootRequirements, {
        lockfile: update ? undefined : existing,
        cache,
        rootName: rootManifest.name
      });
      if (!resolved.success) {
        return { success: false, error: { stage: 'resolution', error: resolved.error } };
      }
      solution = resolved.data;
    }

    const built = await new PackageGraphBuilder(providers).build(solution, { root: rootManifest, platform, cache });
    if (!built.success) {
      return { success: false, error: { stage: 'graph', error: built.error } };
    }

    const lockfile = lockfileFromSolution(solution);
    let lockfileWritten = false;
    if (!fastPath && lockfilePath) {
      if (signal?.aborted) {
        return { success: false, error: { stage: 'resolution', error: { kind: 'cancelled' } } };
      }
      await writeLockfile(lockfilePath, lockfile);
      lockfileWritten = true;
    }

    return {
      success: true,
      data: { solution, graph: built.data, lockfile, fastPath, staleReasons, lockfileWritten }
    };
  } finally {
    cache.clear();
  }
}
