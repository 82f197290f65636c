import * as semver from 'semver';
import type {
  PackageBinding,
  PackageIdentity,
  PackageManifest,
  Result,
  TargetDependency,
  TargetDescription
} from '../../types/index.js';
import type { Providers } from '../providers/types.js';
import { CancelledError, ProviderCache } from '../providers/provider-cache.js';
import type { Solution } from '../resolution/types.js';
import { compareIdentities } from '../../utils/package-identity.js';
import { logger } from '../../utils/logger.js';
import { PackageGraph, targetKey } from './package-graph.js';
import type {
  BuildOptions,
  GraphError,
  Module,
  ResolvedPackage,
  ResolvedProduct,
  ResolvedTarget,
  TargetReference
} from './types.js';

const log = logger.scoped('graph');

/** Module name of a target: every character that is not a letter, digit or underscore becomes `_` */
export function moduleName(targetName: string): string {
  return targetName.replace(/[^A-Za-z0-9_]/g, '_');
}

/** Thrown inside a build to stop at the first validation failure */
class GraphBuildFailure extends Error {
  constructor(readonly error: GraphError) {
    super(`Graph build failed: ${error.kind}`);
  }
}

interface LoadedPackage {
  identity: PackageIdentity;
  binding: PackageBinding;
  manifest: PackageManifest;
  isRoot: boolean;
}

/**
 * Expands a Solution into a validated PackageGraph.
 *
 * Manifests are fetched concurrently. Validation then runs over the complete
 * snapshot in a fixed order: replacement, module uniqueness, dependency
 * resolution, acyclicity, platform compatibility, reachability pruning.
 */
export class PackageGraphBuilder {
  constructor(private readonly providers: Providers) {}

  async build(solution: Solution, options: BuildOptions): Promise<Result<PackageGraph, GraphError>> {
    const ownsCache = !options.cache;
    const cache = options.cache ?? new ProviderCache(this.providers, options.signal);

    try {
      cache.throwIfCancelled();
      const loaded = await this.loadPackages(solution, options.root, cache);
      const graph = new GraphAssembly(loaded, options.root.identity, options.platform).assemble();
      log.info(`Built package graph with ${graph.modules.length} module(s)`);
      return { success: true, data: graph };
    } catch (error) {
      if (error instanceof CancelledError) {
        return { success: false, error: { kind: 'cancelled' } };
      }
      if (error instanceof GraphBuildFailure) {
        log.debug('Package graph validation failed', error.error);
        return { success: false, error: error.error };
      }
      throw error;
    } finally {
      if (ownsCache) cache.clear();
    }
  }

  private async loadPackages(
    solution: Solution,
    root: PackageManifest,
    cache: ProviderCache
  ): Promise<LoadedPackage[]> {
    const entries = solution.packages.filter(entry => entry.identity !== root.identity);
    const manifests = await Promise.all(entries.map(entry => cache.manifest(entry.identity, entry.binding)));

    const loaded: LoadedPackage[] = [
      { identity: root.identity, binding: { kind: 'path', path: '.' }, manifest: root, isRoot: true }
    ];
    entries.forEach((entry, i) => {
      const manifest = manifests[i];
      if (!manifest.success) {
        const error = manifest.error;
        throw new GraphBuildFailure(
          error.kind === 'manifest-error'
            ? { kind: 'manifest-unavailable', identity: error.identity, message: error.message }
            : error
        );
      }
      loaded.push({ identity: entry.identity, binding: entry.binding, manifest: manifest.data, isRoot: false });
    });
    return loaded;
  }
}

/**
 * Validation over one immutable snapshot of manifests
 */
class GraphAssembly {
  private readonly packages = new Map<PackageIdentity, LoadedPackage>();
  /** Replaced identity to the identity that replaces it */
  private readonly replacements = new Map<PackageIdentity, PackageIdentity>();
  private readonly edges = new Map<string, TargetReference[]>();

  constructor(
    loaded: LoadedPackage[],
    private readonly rootIdentity: PackageIdentity,
    private readonly platform: string | undefined
  ) {
    for (const pkg of loaded) {
      this.packages.set(pkg.identity, pkg);
    }
  }

  assemble(): PackageGraph {
    this.applyReplacements();
    this.checkModuleUniqueness();
    this.resolveDependencies();

    const rootTargets = this.includedTargets(this.rootPackage()).map(target => ({
      package: this.rootIdentity,
      target: target.name
    }));
    const order = this.checkAcyclic(rootTargets);
    this.checkPlatforms(order);
    return this.prune(rootTargets, order);
  }

  // Replacement

  private applyReplacements(): void {
    const identities = [...this.packages.keys()].sort(compareIdentities);
    for (const identity of identities) {
      const pkg = this.packages.get(identity);
      if (!pkg) continue;
      for (const replaced of pkg.manifest.replaces) {
        if (replaced === identity || !this.packages.has(replaced) || replaced === this.rootIdentity) continue;
        log.debug(`${identity} replaces ${replaced}`);
        this.packages.delete(replaced);
        this.replacements.set(replaced, identity);
      }
    }
  }

  private canonical(identity: PackageIdentity): PackageIdentity {
    let current = identity;
    const seen = new Set<PackageIdentity>();
    for (let next = this.replacements.get(current); next && !seen.has(next); next = this.replacements.get(current)) {
      seen.add(next);
      current = next;
    }
    return current;
  }

  // Uniqueness

  /** Test targets only take part for the root package */
  private includedTargets(pkg: LoadedPackage): TargetDescription[] {
    return pkg.isRoot ? pkg.manifest.targets : pkg.manifest.targets.filter(target => target.kind !== 'test');
  }

  private checkModuleUniqueness(): void {
    const owners = new Map<string, TargetReference[]>();
    for (const pkg of this.sortedPackages()) {
      for (const target of this.includedTargets(pkg)) {
        const name = moduleName(target.name);
        owners.set(name, [...(owners.get(name) ?? []), { package: pkg.identity, target: target.name }]);
      }
    }
    const collisions = [...owners.entries()]
      .filter(([, targets]) => targets.length > 1)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    if (collisions.length > 0) {
      const [module, targets] = collisions[0];
      const packages = [...new Set(targets.map(reference => reference.package))];
      throw new GraphBuildFailure({ kind: 'duplicate-module', module, packages, targets });
    }
  }

  // Dependency resolution

  private resolveDependencies(): void {
    for (const pkg of this.sortedPackages()) {
      const targets = this.includedTargets(pkg);
      for (const product of pkg.manifest.products) {
        const missing = product.targets.find(name => !targets.some(target => target.name === name));
        if (missing) {
          throw new GraphBuildFailure({
            kind: 'unresolved-target-reference',
            package: pkg.identity,
            target: product.name,
            dependency: missing
          });
        }
      }
      for (const target of targets) {
        const resolved: TargetReference[] = [];
        for (const dependency of target.dependencies) {
          if (!this.appliesToPlatform(dependency)) continue;
          resolved.push(...this.resolveDependency(pkg, target, dependency));
        }
        this.edges.set(targetKey({ package: pkg.identity, target: target.name }), resolved);
      }
    }
  }

  private appliesToPlatform(dependency: TargetDependency): boolean {
    const platforms = dependency.condition?.platforms ?? [];
    return this.platform === undefined || platforms.length === 0 || platforms.includes(this.platform);
  }

  private resolveDependency(
    pkg: LoadedPackage,
    target: TargetDescription,
    dependency: TargetDependency
  ): TargetReference[] {
    const sameTarget = this.includedTargets(pkg).find(candidate => candidate.name === dependency.name);

    switch (dependency.kind) {
      case 'target':
        if (!sameTarget) {
          throw new GraphBuildFailure({
            kind: 'unresolved-target-reference',
            package: pkg.identity,
            target: target.name,
            dependency: dependency.name
          });
        }
        return [{ package: pkg.identity, target: sameTarget.name }];

      case 'product': {
        const found = this.findProduct(pkg, dependency.package, dependency.name);
        if (!found) {
          throw new GraphBuildFailure({
            kind: 'unresolved-product-reference',
            package: pkg.identity,
            target: target.name,
            product: dependency.name,
            dependency: dependency.package
          });
        }
        return found;
      }

      case 'by-name': {
        if (sameTarget) {
          return [{ package: pkg.identity, target: sameTarget.name }];
        }
        for (const declared of pkg.manifest.dependencies) {
          const found = this.findProduct(pkg, declared.identity, dependency.name);
          if (found) return found;
        }
        throw new GraphBuildFailure({
          kind: 'unresolved-product-reference',
          package: pkg.identity,
          target: target.name,
          product: dependency.name,
          dependency: dependency.name.toLowerCase()
        });
      }
    }
  }

  /**
   * Targets of a product exposed by a package `pkg` declares as a dependency,
   * looking through replacements.
   */
  private findProduct(pkg: LoadedPackage, dependencyIdentity: PackageIdentity, productName: string): TargetReference[] | undefined {
    const identity = this.canonical(dependencyIdentity);
    const declared = pkg.manifest.dependencies.some(dependency => this.canonical(dependency.identity) === identity);
    const provider = this.packages.get(identity);
    if (!declared || !provider || provider.identity === pkg.identity) return undefined;

    const product = provider.manifest.products.find(candidate => candidate.name === productName);
    return product?.targets.map(name => ({ package: provider.identity, target: name }));
  }

  // Acyclicity

  /**
   * Depth-first walk from the root targets with a recursion stack. Returns the
   * reachable targets, each after its dependencies.
   */
  private checkAcyclic(rootTargets: TargetReference[]): TargetReference[] {
    const order: TargetReference[] = [];
    const done = new Set<string>();
    const visiting: TargetReference[] = [];

    const visit = (reference: TargetReference): void => {
      const key = targetKey(reference);
      if (done.has(key)) return;
      const start = visiting.findIndex(entry => targetKey(entry) === key);
      if (start >= 0) {
        const path = visiting.slice(start).map(entry => ({ ...entry }));
        log.debug(`Dependency cycle: ${path.map(targetKey).join(' -> ')}`);
        throw new GraphBuildFailure({ kind: 'dependency-cycle', path });
      }

      visiting.push(reference);
      for (const dependency of this.edges.get(key) ?? []) {
        visit(dependency);
      }
      visiting.pop();
      done.add(key);
      order.push(reference);
    };

    for (const reference of rootTargets) {
      visit(reference);
    }
    return order;
  }

  // Platforms

  private checkPlatforms(order: TargetReference[]): void {
    const checked = new Set<string>();
    for (const reference of order) {
      for (const dependency of this.edges.get(targetKey(reference)) ?? []) {
        if (dependency.package === reference.package) continue;
        const pairKey = `${reference.package}->${dependency.package}`;
        if (checked.has(pairKey)) continue;
        checked.add(pairKey);
        this.checkPlatformPair(reference.package, dependency.package);
      }
    }
  }

  private checkPlatformPair(dependantIdentity: PackageIdentity, dependencyIdentity: PackageIdentity): void {
    const dependant = this.packages.get(dependantIdentity);
    const dependency = this.packages.get(dependencyIdentity);
    if (!dependant || !dependency) return;

    const platforms = Object.keys(dependant.manifest.platforms)
      .filter(platform => this.platform === undefined || platform === this.platform)
      .sort();
    for (const platform of platforms) {
      const declared = dependant.manifest.platforms[platform];
      const required = dependency.manifest.platforms[platform];
      if (required === undefined) continue;
      const declaredVersion = semver.coerce(declared);
      const requiredVersion = semver.coerce(required);
      if (declaredVersion && requiredVersion && semver.gt(requiredVersion, declaredVersion)) {
        throw new GraphBuildFailure({
          kind: 'incompatible-platform',
          package: dependantIdentity,
          dependency: dependencyIdentity,
          platform,
          required,
          declared
        });
      }
    }
  }

  // Pruning

  private prune(rootTargets: TargetReference[], order: TargetReference[]): PackageGraph {
    const reachable = new Set(order.map(targetKey));

    const packages: ResolvedPackage[] = this.sortedPackages().map(pkg => {
      const targets: ResolvedTarget[] = this.includedTargets(pkg)
        .filter(target => reachable.has(targetKey({ package: pkg.identity, target: target.name })))
        .map(target => Object.freeze({
          package: pkg.identity,
          name: target.name,
          kind: target.kind,
          moduleName: moduleName(target.name),
          dependencies: Object.freeze(
            (this.edges.get(targetKey({ package: pkg.identity, target: target.name })) ?? [])
              .map(reference => Object.freeze({ ...reference }))
          )
        }));
      const kept = new Set(targets.map(target => target.name));
      const products: ResolvedProduct[] = pkg.manifest.products
        .filter(product => product.targets.some(name => kept.has(name)))
        .map(product => Object.freeze({
          package: pkg.identity,
          name: product.name,
          kind: product.kind,
          targets: Object.freeze(product.targets.filter(name => kept.has(name)))
        }));

      return Object.freeze({
        identity: pkg.identity,
        name: pkg.manifest.name,
        binding: Object.freeze({ ...pkg.binding }),
        isRoot: pkg.isRoot,
        platforms: Object.freeze({ ...pkg.manifest.platforms }),
        targets: Object.freeze(targets),
        products: Object.freeze(products)
      });
    });

    const kinds = new Map(packages.flatMap(pkg => pkg.targets.map(target => [
      targetKey({ package: target.package, target: target.name }),
      target.kind
    ] as const)));
    const modules: Module[] = order.map(reference => Object.freeze({
      name: moduleName(reference.target),
      kind: kinds.get(targetKey(reference)) ?? 'regular',
      target: Object.freeze({ ...reference })
    }));

    const closures = new Map<string, readonly string[]>();
    for (const root of rootTargets) {
      const needed = this.closureOf(root);
      closures.set(
        root.target,
        Object.freeze(order.filter(reference => needed.has(targetKey(reference))).map(reference => moduleName(reference.target)))
      );
    }

    log.debug(`Pruned to ${order.length} reachable target(s)`);
    return new PackageGraph(this.rootIdentity, Object.freeze(packages), Object.freeze(modules), closures);
  }

  private closureOf(start: TargetReference): Set<string> {
    const seen = new Set<string>();
    const stack = [start];
    for (let next = stack.pop(); next; next = stack.pop()) {
      const key = targetKey(next);
      if (seen.has(key)) continue;
      seen.add(key);
      stack.push(...(this.edges.get(key) ?? []));
    }
    return seen;
  }

  private rootPackage(): LoadedPackage {
    const root = this.packages.get(this.rootIdentity);
    if (!root) {
      throw new Error(`Root package ${this.rootIdentity} missing from graph`);
    }
    return root;
  }

  private sortedPackages(): LoadedPackage[] {
    return [...this.packages.values()].sort((a, b) => compareIdentities(a.identity, b.identity));
  }
}
