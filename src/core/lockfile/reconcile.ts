import type {
  DependencyDeclaration,
  PackageBinding,
  PackageIdentity,
  Requirement,
  Result,
  UnversionedRequirement
} from '../../types/index.js';
import type { Providers } from '../providers/types.js';
import { CancelledError, ProviderCache } from '../providers/provider-cache.js';
import { bindingSatisfies, describeBinding, describeRequirement, isUnversioned, nestedPath } from '../requirement.js';
import { createSolution, versionedRequirementKind } from '../resolution/solution.js';
import type { Solution, SolutionEntry } from '../resolution/types.js';
import { logger } from '../../utils/logger.js';
import type { Lockfile, Pin } from './lockfile.js';

const log = logger.scoped('lockfile');

export type StaleReason =
  | { kind: 'missing-pin'; identity: PackageIdentity }
  | { kind: 'unsatisfied-requirement'; identity: PackageIdentity; requirement: string; pinned: string }
  | { kind: 'unversioned-dependency'; identity: PackageIdentity; dependency: PackageIdentity }
  | { kind: 'requirement-kind-changed'; identity: PackageIdentity; pinned: string; current: string }
  | { kind: 'unreachable-pin'; identity: PackageIdentity }
  | { kind: 'manifest-unavailable'; identity: PackageIdentity; message: string };

export type FastPathResult =
  | { kind: 'fresh'; solution: Solution }
  | { kind: 'stale'; reasons: StaleReason[] };

export interface ReconcileOptions {
  signal?: AbortSignal;
  /** Share a provider cache with the rest of the call; the caller owns and clears it */
  cache?: ProviderCache;
}

export function describeStaleReason(reason: StaleReason): string {
  switch (reason.kind) {
    case 'missing-pin':
      return `${reason.identity} is required but not pinned`;
    case 'unsatisfied-requirement':
      return `${reason.identity} is pinned to ${reason.pinned}, which does not satisfy ${reason.requirement}`;
    case 'unversioned-dependency':
      return `${reason.identity} depends on ${reason.dependency} without a version`;
    case 'requirement-kind-changed':
      return `${reason.identity} was pinned for a ${reason.pinned} requirement, now ${reason.current}`;
    case 'unreachable-pin':
      return `${reason.identity} is pinned but no longer required`;
    case 'manifest-unavailable':
      return `manifest of ${reason.identity} is unavailable: ${reason.message}`;
  }
}

interface Reached {
  binding: PackageBinding;
  requirementKind: SolutionEntry['requirementKind'];
  dependencies: DependencyDeclaration[];
}

/**
 * Check a lockfile against the live requirements without searching.
 *
 * Walks the requirement graph from the root through the pinned versions'
 * manifests. The lockfile is fresh when every requirement met on the way is
 * satisfied by its pin and the reached set equals the pinned set. Version
 * lists are never queried; only manifests of pinned bindings are read.
 */
export async function reconcile(
  rootRequirements: readonly DependencyDeclaration[],
  lockfile: Lockfile,
  providers: Providers,
  options: ReconcileOptions = {}
): Promise<Result<FastPathResult, { kind: 'cancelled' }>> {
  const ownsCache = !options.cache;
  const cache = options.cache ?? new ProviderCache(providers, options.signal);
  try {
    cache.throwIfCancelled();
    const result = await new Reconciliation(lockfile, cache).run(rootRequirements);
    if (result.kind === 'stale') {
      log.info(`Lockfile is stale: ${result.reasons.map(describeStaleReason).join('; ')}`);
    }
    return { success: true, data: result };
  } catch (error) {
    if (error instanceof CancelledError) {
      return { success: false, error: { kind: 'cancelled' } };
    }
    throw error;
  } finally {
    if (ownsCache) cache.clear();
  }
}

class Reconciliation {
  private readonly pins: Map<PackageIdentity, Pin>;
  private readonly reasons: StaleReason[] = [];
  private readonly overrides = new Map<PackageIdentity, Reached & { requirement: UnversionedRequirement }>();
  private readonly versioned = new Map<PackageIdentity, Reached>();
  private readonly incoming = new Map<PackageIdentity, Requirement[]>();

  constructor(lockfile: Lockfile, private readonly cache: ProviderCache) {
    this.pins = new Map(lockfile.pins.map(pin => [pin.identity, pin]));
  }

  async run(rootRequirements: readonly DependencyDeclaration[]): Promise<FastPathResult> {
    await this.bindOverrides(rootRequirements);
    await this.walkVersioned(rootRequirements);

    for (const [identity, reached] of this.versioned) {
      const pinned = this.pins.get(identity)?.requirementKind;
      const current = versionedRequirementKind(this.incoming.get(identity) ?? []);
      if (pinned && pinned !== current) {
        this.reasons.push({ kind: 'requirement-kind-changed', identity, pinned, current });
      }
      reached.requirementKind = current;
    }

    // A pin already reported as wrong is not also reported as unreachable
    const reported = new Set(this.reasons.map(reason => reason.identity));
    for (const identity of this.pins.keys()) {
      if (!this.versioned.has(identity) && !this.overrides.has(identity) && !reported.has(identity)) {
        this.reasons.push({ kind: 'unreachable-pin', identity });
      }
    }

    if (this.reasons.length > 0) {
      return { kind: 'stale', reasons: this.reasons };
    }

    const entries: SolutionEntry[] = [];
    for (const [identity, reached] of [...this.overrides, ...this.versioned]) {
      entries.push({ identity, binding: reached.binding, requirementKind: reached.requirementKind });
    }
    log.debug(`Lockfile is fresh with ${entries.length} package(s)`);
    return { kind: 'fresh', solution: createSolution(entries) };
  }

  /** Root-bound branch, revision and path packages, breadth-first as the resolver binds them */
  private async bindOverrides(rootRequirements: readonly DependencyDeclaration[]): Promise<void> {
    const queue: Array<{ identity: PackageIdentity; requirement: UnversionedRequirement; parentPath?: string }> = [];
    for (const { identity, requirement } of rootRequirements) {
      if (isUnversioned(requirement)) queue.push({ identity, requirement });
    }

    for (let next = queue.shift(); next; next = queue.shift()) {
      const { identity, parentPath } = next;
      const requirement: UnversionedRequirement = next.requirement.kind === 'path' && parentPath !== undefined
        ? { kind: 'path', path: nestedPath(parentPath, next.requirement.path) }
        : next.requirement;
      if (this.overrides.has(identity)) continue;

      const binding = this.pinnedOverride(identity, requirement);
      if (!binding) continue;

      const dependencies = await this.dependenciesOf(identity, binding);
      this.overrides.set(identity, { binding, requirement, requirementKind: requirement.kind, dependencies });

      for (const dependency of dependencies) {
        if (isUnversioned(dependency.requirement)) {
          queue.push({
            identity: dependency.identity,
            requirement: dependency.requirement,
            parentPath: binding.kind === 'path' ? binding.path : undefined
          });
        }
      }
    }
  }

  private pinnedOverride(identity: PackageIdentity, requirement: UnversionedRequirement): PackageBinding | undefined {
    const pin = this.pins.get(identity);
    if (requirement.kind === 'path') {
      // Path bindings are never pinned
      if (pin) {
        this.reasons.push({ kind: 'requirement-kind-changed', identity, pinned: pin.requirementKind, current: 'path' });
      }
      return { kind: 'path', path: requirement.path };
    }
    if (!pin) {
      this.reasons.push({ kind: 'missing-pin', identity });
      return undefined;
    }
    if (!bindingSatisfies(pin.state, requirement) || pin.requirementKind !== requirement.kind) {
      this.reasons.push({
        kind: 'unsatisfied-requirement',
        identity,
        requirement: describeRequirement(requirement),
        pinned: describeBinding(pin.state)
      });
      return undefined;
    }
    return pin.state;
  }

  private async walkVersioned(rootRequirements: readonly DependencyDeclaration[]): Promise<void> {
    const queue: Array<{ from?: PackageIdentity; dependency: DependencyDeclaration }> = [];
    const enqueue = (dependencies: readonly DependencyDeclaration[], from?: PackageIdentity): void => {
      for (const dependency of dependencies) queue.push({ from, dependency });
    };

    enqueue(rootRequirements);
    for (const [identity, override] of this.overrides) {
      enqueue(override.dependencies, identity);
    }

    for (let next = queue.shift(); next; next = queue.shift()) {
      const { from, dependency } = next;
      const { identity, requirement } = dependency;
      if (this.overrides.has(identity) || identity === from) continue;

      if (isUnversioned(requirement)) {
        // Handled by bindOverrides for the root and root-bound packages
        if (from !== undefined && !this.overrides.has(from)) {
          this.reasons.push({ kind: 'unversioned-dependency', identity: from, dependency: identity });
        }
        continue;
      }

      const pin = this.pins.get(identity);
      if (!pin) {
        this.reasons.push({ kind: 'missing-pin', identity });
        continue;
      }
      if (!bindingSatisfies(pin.state, requirement)) {
        this.reasons.push({
          kind: 'unsatisfied-requirement',
          identity,
          requirement: describeRequirement(requirement),
          pinned: describeBinding(pin.state)
        });
        continue;
      }

      this.incoming.set(identity, [...(this.incoming.get(identity) ?? []), requirement]);
      if (this.versioned.has(identity)) continue;

      const dependencies = await this.dependenciesOf(identity, pin.state);
      this.versioned.set(identity, { binding: pin.state, requirementKind: pin.requirementKind, dependencies });
      enqueue(dependencies, identity);
    }
  }

  private async dependenciesOf(identity: PackageIdentity, binding: PackageBinding): Promise<DependencyDeclaration[]> {
    const manifest = await this.cache.manifest(identity, binding);
    if (!manifest.success) {
      this.reasons.push({ kind: 'manifest-unavailable', identity, message: manifest.error.message });
      return [];
    }
    return manifest.data.dependencies;
  }
}
