import type {
  DependencyDeclaration,
  PackageBinding,
  PackageIdentity,
  PackageManifest,
  UnversionedRequirement
} from '../../types/index.js';
import type { ProviderCache } from '../providers/provider-cache.js';
import type { Lockfile } from '../lockfile/lockfile.js';
import { bindingSatisfies, describeRequirement, isUnversioned, nestedPath } from '../requirement.js';
import { ResolutionAbort } from './errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.scoped('solver');

/**
 * A package the root binds to a branch, revision or path. Bound before the
 * search starts and never revisited.
 */
export interface BoundOverride {
  identity: PackageIdentity;
  requirement: UnversionedRequirement;
  binding: PackageBinding;
  manifest: PackageManifest;
  /** How explanations name this package, e.g. `utils (branch main)` */
  label: string;
}

interface PendingOverride {
  identity: PackageIdentity;
  requirement: UnversionedRequirement;
  declaredBy?: BoundOverride;
}

/**
 * Bind the root's unversioned requirements, then the unversioned requirements
 * of those packages, breadth-first. The first binding of an identity wins.
 */
export async function collectOverrides(
  rootRequirements: readonly DependencyDeclaration[],
  cache: ProviderCache,
  lockfile?: Lockfile
): Promise<Map<PackageIdentity, BoundOverride>> {
  const bound = new Map<PackageIdentity, BoundOverride>();
  const queue: PendingOverride[] = [];
  for (const { identity, requirement } of rootRequirements) {
    if (isUnversioned(requirement)) {
      queue.push({ identity, requirement });
    }
  }

  for (let next = queue.shift(); next; next = queue.shift()) {
    const { identity, declaredBy } = next;
    const requirement = relativeTo(next.requirement, declaredBy);

    const existing = bound.get(identity);
    if (existing) {
      if (!bindingSatisfies(existing.binding, requirement)) {
        log.warn(
          `Ignoring ${describeRequirement(requirement)} for ${identity} from ${declaredBy?.identity ?? 'root'}; ` +
          `already bound to ${existing.label}`
        );
      }
      continue;
    }

    const binding = await bind(identity, requirement, cache, lockfile);
    const manifest = await cache.manifest(identity, binding);
    if (!manifest.success) {
      const error = manifest.error;
      throw new ResolutionAbort(
        error.kind === 'manifest-error'
          ? { kind: 'no-usable-version', identity, failures: [error] }
          : error
      );
    }

    const override: BoundOverride = {
      identity,
      requirement,
      binding,
      manifest: manifest.data,
      label: `${identity} (${describeRequirement(requirement)})`
    };
    bound.set(identity, override);
    log.debug(`Bound ${override.label}`);

    for (const dependency of manifest.data.dependencies) {
      if (isUnversioned(dependency.requirement)) {
        queue.push({ identity: dependency.identity, requirement: dependency.requirement, declaredBy: override });
      }
    }
  }

  return bound;
}

/** Path requirements of a path-bound package are relative to that package */
function relativeTo(requirement: UnversionedRequirement, declaredBy?: BoundOverride): UnversionedRequirement {
  if (requirement.kind === 'path' && declaredBy?.binding.kind === 'path') {
    return { kind: 'path', path: nestedPath(declaredBy.binding.path, requirement.path) };
  }
  return requirement;
}

async function bind(
  identity: PackageIdentity,
  requirement: UnversionedRequirement,
  cache: ProviderCache,
  lockfile?: Lockfile
): Promise<PackageBinding> {
  switch (requirement.kind) {
    case 'path':
      return { kind: 'path', path: requirement.path };
    case 'revision':
      return { kind: 'revision', revision: requirement.revision };
    case 'branch': {
      const pin = lockfile?.pins.find(candidate => candidate.identity === identity);
      if (pin?.state.kind === 'branch' && pin.state.branch === requirement.branch) {
        return { kind: 'branch', branch: requirement.branch, revision: pin.state.revision };
      }
      const head = await cache.resolveRevision(identity, requirement.branch);
      if (!head.success) {
        throw new ResolutionAbort(head.error);
      }
      return { kind: 'branch', branch: requirement.branch, revision: head.data };
    }
  }
}
