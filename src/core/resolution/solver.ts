import type {
  DependencyDeclaration,
  PackageIdentity,
  PackageManifest,
  Requirement,
  Result
} from '../../types/index.js';
import { ROOT_IDENTITY, ROOT_VERSION } from '../../constants/index.js';
import { VersionSet } from '../version-set.js';
import { isUnversioned, requirementToVersionSet } from '../requirement.js';
import { CancelledError, ProviderCache } from '../providers/provider-cache.js';
import type { ManifestError, Providers } from '../providers/types.js';
import type { Lockfile } from '../lockfile/lockfile.js';
import { compareIdentities } from '../../utils/package-identity.js';
import { logger } from '../../utils/logger.js';
import { Incompatibility, externalCauses } from './incompatibility.js';
import { PartialSolution, type Assignment } from './partial-solution.js';
import { Term } from './term.js';
import { explainFailure } from './explanation.js';
import { collectOverrides, type BoundOverride } from './overrides.js';
import { ResolutionAbort } from './errors.js';
import { createSolution, versionedRequirementKind } from './solution.js';
import type { ResolutionError, ResolveOptions, Solution, SolutionEntry } from './types.js';

const log = logger.scoped('solver');

/**
 * Conflict-driven version solver.
 *
 * Each `resolve` call owns its incompatibilities, partial solution and (unless
 * one is passed in) its provider cache; nothing survives the call except the
 * returned Solution.
 */
export class Resolver {
  constructor(private readonly providers: Providers) {}

  async resolve(
    rootRequirements: readonly DependencyDeclaration[],
    options: ResolveOptions = {}
  ): Promise<Result<Solution, ResolutionError>> {
    const ownsCache = !options.cache;
    const cache = options.cache ?? new ProviderCache(this.providers, options.signal);
    const run = new SolverRun(rootRequirements, cache, options.lockfile, options.rootName ?? 'root');

    try {
      cache.throwIfCancelled();
      const solution = await run.solve();
      return { success: true, data: solution };
    } catch (error) {
      if (error instanceof CancelledError) {
        log.debug('Resolution cancelled');
        return { success: false, error: { kind: 'cancelled' } };
      }
      if (error instanceof ResolutionAbort) {
        return { success: false, error: error.error };
      }
      throw error;
    } finally {
      if (ownsCache) cache.clear();
    }
  }
}

type PropagationResult = PackageIdentity | 'conflict' | undefined;

/**
 * State of one resolution call
 */
class SolverRun {
  private readonly solution = new PartialSolution();
  private readonly incompatibilities = new Map<PackageIdentity, Incompatibility[]>();
  private overrides = new Map<PackageIdentity, BoundOverride>();
  /** Manifests of decided versions, keyed by `identity@version` */
  private readonly manifests = new Map<string, PackageManifest>();
  private readonly manifestFailures = new Map<PackageIdentity, ManifestError[]>();

  constructor(
    private readonly rootRequirements: readonly DependencyDeclaration[],
    private readonly cache: ProviderCache,
    private readonly lockfile: Lockfile | undefined,
    private readonly rootName: string
  ) {}

  async solve(): Promise<Solution> {
    this.overrides = await collectOverrides(this.rootRequirements, this.cache, this.lockfile);

    this.addIncompatibility(new Incompatibility(
      [new Term(ROOT_IDENTITY, VersionSet.exact(ROOT_VERSION), false)],
      { kind: 'root' }
    ));

    let next: PackageIdentity | undefined = ROOT_IDENTITY;
    while (next !== undefined) {
      this.propagate(next);
      next = await this.choosePackageVersion();
    }

    return this.buildSolution();
  }

  // Unit propagation

  private propagate(start: PackageIdentity): void {
    const changed = new Set<PackageIdentity>([start]);

    while (changed.size > 0) {
      const [identity] = changed;
      changed.delete(identity);

      // Newest incompatibilities first: they tend to be the most specific
      const related = this.incompatibilities.get(identity) ?? [];
      for (let i = related.length - 1; i >= 0; i--) {
        const result = this.propagateIncompatibility(related[i]);
        if (result === 'conflict') {
          const rootCause = this.resolveConflict(related[i]);
          changed.clear();
          const derived = this.propagateIncompatibility(rootCause);
          if (derived !== undefined && derived !== 'conflict') {
            changed.add(derived);
          }
          break;
        }
        if (result !== undefined) {
          changed.add(result);
        }
      }
    }
  }

  /**
   * Derive the inverse of the only undetermined term when every other term
   * is satisfied. Returns the derived package, `conflict` when every term is
   * satisfied, or undefined when nothing follows.
   */
  private propagateIncompatibility(incompatibility: Incompatibility): PropagationResult {
    let unsatisfied: Term | undefined;
    for (const term of incompatibility.terms) {
      const relation = this.solution.relation(term);
      if (relation === 'contradicted') return undefined;
      if (relation === 'inconclusive') {
        if (unsatisfied) return undefined;
        unsatisfied = term;
      }
    }

    if (!unsatisfied) return 'conflict';

    log.debug(`Derived ${unsatisfied.inverse().toString()} from ${incompatibility.toString()}`);
    this.solution.derive(unsatisfied.inverse(), incompatibility);
    return unsatisfied.identity;
  }

  // Conflict resolution

  private resolveConflict(conflict: Incompatibility): Incompatibility {
    log.debug(`Conflict: ${conflict.toString()}`);
    let incompatibility = conflict;
    let createdIncompatibility = false;

    while (!incompatibility.isFailure()) {
      let mostRecentTerm: Term | undefined;
      let mostRecentSatisfier: Assignment | undefined;
      let difference: Term | undefined;
      let previousSatisfierLevel = 1;

      for (const term of incompatibility.terms) {
        const satisfier = this.solution.satisfier(term);
        if (!mostRecentSatisfier) {
          mostRecentTerm = term;
          mostRecentSatisfier = satisfier;
        } else if (mostRecentSatisfier.index < satisfier.index) {
          previousSatisfierLevel = Math.max(previousSatisfierLevel, mostRecentSatisfier.decisionLevel);
          mostRecentTerm = term;
          mostRecentSatisfier = satisfier;
          difference = undefined;
        } else {
          previousSatisfierLevel = Math.max(previousSatisfierLevel, satisfier.decisionLevel);
        }

        if (mostRecentTerm === term) {
          // The satisfier may only partly satisfy the term; the remainder was
          // satisfied by something earlier, which bounds the backjump.
          difference = mostRecentSatisfier.term.difference(mostRecentTerm);
          if (difference) {
            previousSatisfierLevel = Math.max(
              previousSatisfierLevel,
              this.solution.satisfier(difference.inverse()).decisionLevel
            );
          }
        }
      }

      if (!mostRecentSatisfier || !mostRecentTerm) {
        break;
      }

      if (previousSatisfierLevel < mostRecentSatisfier.decisionLevel || !mostRecentSatisfier.cause) {
        log.debug(`Backtracking to level ${previousSatisfierLevel}`);
        this.solution.backtrack(previousSatisfierLevel);
        if (createdIncompatibility) {
          this.addIncompatibility(incompatibility);
        }
        return incompatibility;
      }

      const satisfierIdentity = mostRecentSatisfier.term.identity;
      const newTerms = [
        ...incompatibility.terms.filter(term => term !== mostRecentTerm),
        ...mostRecentSatisfier.cause.terms.filter(term => term.identity !== satisfierIdentity)
      ];
      if (difference) {
        newTerms.push(difference.inverse());
      }

      incompatibility = new Incompatibility(newTerms, {
        kind: 'derived',
        conflict: incompatibility,
        other: mostRecentSatisfier.cause
      });
      createdIncompatibility = true;
      log.debug(`Derived incompatibility ${incompatibility.toString()}`);
    }

    throw new ResolutionAbort(this.classifyFailure(incompatibility));
  }

  // Decision making

  /**
   * Pick the undecided package with the fewest candidates (ties by identity),
   * add its dependencies, and decide it unless they already conflict.
   * Returns the package to propagate next, or undefined when solved.
   */
  private async choosePackageVersion(): Promise<PackageIdentity | undefined> {
    const unsatisfied = this.solution.unsatisfied();
    if (unsatisfied.length === 0) return undefined;

    const rootTerm = unsatisfied.find(term => term.identity === ROOT_IDENTITY);
    if (rootTerm) {
      for (const incompatibility of this.rootIncompatibilities()) {
        this.addIncompatibility(incompatibility);
      }
      this.solution.decide(ROOT_IDENTITY, ROOT_VERSION);
      return ROOT_IDENTITY;
    }

    // Version lists of every undecided package, fetched concurrently
    const lists = await Promise.all(unsatisfied.map(term => this.cache.availableVersions(term.identity)));

    let chosen: { term: Term; candidates: string[] } | undefined;
    for (let i = 0; i < unsatisfied.length; i++) {
      const listed = lists[i];
      if (!listed.success) {
        throw new ResolutionAbort(listed.error);
      }
      const term = unsatisfied[i];
      const candidates = listed.data.filter(version => term.versions.contains(version));
      // unsatisfied() is ordered by identity, so the first minimum wins ties
      if (!chosen || candidates.length < chosen.candidates.length) {
        chosen = { term, candidates };
      }
    }
    if (!chosen) return undefined;

    const { term, candidates } = chosen;
    const identity = term.identity;
    if (candidates.length === 0) {
      log.debug(`No versions of ${identity} match ${term.versions.toString()}`);
      this.addIncompatibility(new Incompatibility([term], { kind: 'no-versions' }));
      return identity;
    }

    const version = this.preferredVersion(identity, candidates);
    const manifest = await this.cache.manifest(identity, { kind: 'version', version });
    if (!manifest.success) {
      const error = manifest.error;
      if (error.kind === 'provider-error') {
        throw new ResolutionAbort(error);
      }
      log.warn(`Skipping ${identity} ${version}: ${error.message}`);
      this.manifestFailures.set(identity, [...(this.manifestFailures.get(identity) ?? []), error]);
      this.addIncompatibility(new Incompatibility(
        [new Term(identity, VersionSet.exact(version), true)],
        { kind: 'unusable-manifest', message: error.message }
      ));
      return identity;
    }

    this.manifests.set(`${identity}@${version}`, manifest.data);

    let conflict = false;
    for (const incompatibility of this.dependencyIncompatibilities(identity, version, manifest.data)) {
      this.addIncompatibility(incompatibility);
      conflict = conflict || incompatibility.terms.every(
        dependencyTerm => dependencyTerm.identity === identity || this.solution.satisfies(dependencyTerm)
      );
    }

    if (!conflict) {
      log.debug(`Selecting ${identity} ${version}`);
      this.solution.decide(identity, version);
    }
    return identity;
  }

  /** The lockfile pin when it is still a candidate, otherwise the highest candidate */
  private preferredVersion(identity: PackageIdentity, candidates: string[]): string {
    const pin = this.lockfile?.pins.find(candidate => candidate.identity === identity);
    if (pin?.state.kind === 'version') {
      const pinned = pin.state.version;
      if (candidates.includes(pinned)) return pinned;
    }
    return candidates[0];
  }

  private rootIncompatibilities(): Incompatibility[] {
    const rootTerm = new Term(ROOT_IDENTITY, VersionSet.exact(ROOT_VERSION), true);
    const result: Incompatibility[] = [];

    for (const { identity, requirement } of this.rootRequirements) {
      if (isUnversioned(requirement) || this.overrides.has(identity)) continue;
      result.push(new Incompatibility(
        [rootTerm, new Term(identity, requirementToVersionSet(requirement), false)],
        { kind: 'dependency' }
      ));
    }

    // Versioned requirements of root-bound packages apply as if the root declared them
    for (const override of this.overrides.values()) {
      for (const { identity, requirement } of override.manifest.dependencies) {
        if (isUnversioned(requirement) || this.overrides.has(identity)) continue;
        result.push(new Incompatibility(
          [rootTerm, new Term(identity, requirementToVersionSet(requirement), false)],
          { kind: 'dependency', depender: override.label }
        ));
      }
    }
    return result;
  }

  private dependencyIncompatibilities(
    identity: PackageIdentity,
    version: string,
    manifest: PackageManifest
  ): Incompatibility[] {
    const depender = new Term(identity, VersionSet.exact(version), true);
    const result: Incompatibility[] = [];

    for (const dependency of manifest.dependencies) {
      if (dependency.identity === identity || this.overrides.has(dependency.identity)) continue;
      const requirement = dependency.requirement;
      if (isUnversioned(requirement)) {
        result.push(new Incompatibility([depender], {
          kind: 'unversioned-dependency',
          dependency: dependency.identity,
          requirement
        }));
        continue;
      }
      result.push(new Incompatibility(
        [depender, new Term(dependency.identity, requirementToVersionSet(requirement), false)],
        { kind: 'dependency' }
      ));
    }
    return result;
  }

  private addIncompatibility(incompatibility: Incompatibility): void {
    for (const term of incompatibility.terms) {
      const list = this.incompatibilities.get(term.identity);
      if (list) {
        list.push(incompatibility);
      } else {
        this.incompatibilities.set(term.identity, [incompatibility]);
      }
    }
  }

  // Results

  private buildSolution(): Solution {
    const incoming = new Map<PackageIdentity, Requirement[]>();
    const addEdges = (dependencies: readonly DependencyDeclaration[]): void => {
      for (const { identity, requirement } of dependencies) {
        incoming.set(identity, [...(incoming.get(identity) ?? []), requirement]);
      }
    };

    addEdges(this.rootRequirements);
    for (const override of this.overrides.values()) {
      addEdges(override.manifest.dependencies);
    }

    const decided = this.solution.decided().filter(([identity]) => identity !== ROOT_IDENTITY);
    for (const [identity, version] of decided) {
      const manifest = this.manifests.get(`${identity}@${version}`);
      if (manifest) addEdges(manifest.dependencies);
    }

    const entries: SolutionEntry[] = decided.map(([identity, version]) => ({
      identity,
      binding: { kind: 'version', version },
      requirementKind: versionedRequirementKind(incoming.get(identity) ?? [])
    }));
    for (const override of this.overrides.values()) {
      entries.push({ identity: override.identity, binding: override.binding, requirementKind: override.requirement.kind });
    }

    log.info(`Resolved ${entries.length} package(s)`);
    return createSolution(entries);
  }

  /**
   * A failed derivation is reported as a missing package or an unusable one
   * when one of its facts says so, otherwise as a version conflict.
   */
  private classifyFailure(failure: Incompatibility): ResolutionError {
    const external = externalCauses(failure);
    const explanation = explainFailure(failure, this.rootName);
    log.debug('Version solving failed', { explanation });

    const exhausted = external
      .filter(incompatibility => incompatibility.cause.kind === 'no-versions')
      .map(incompatibility => incompatibility.terms[0].identity)
      .sort(compareIdentities);

    for (const identity of exhausted) {
      const published = this.cache.peekVersions(identity);
      if (published && published.length === 0) {
        return { kind: 'package-not-found', identity, explanation };
      }
      const failures = this.manifestFailures.get(identity) ?? [];
      if (published && failures.length > 0 && failures.length >= published.length) {
        return { kind: 'no-usable-version', identity, failures };
      }
    }

    const packages = [...new Set(
      external.flatMap(incompatibility => incompatibility.terms.map(term => term.identity))
    )]
      .filter(identity => identity !== ROOT_IDENTITY)
      .sort(compareIdentities);

    return { kind: 'version-conflict', incompatibility: failure, explanation, packages };
  }
}
