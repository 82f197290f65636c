import type { PackageIdentity } from '../../types/index.js';
import type { Module, ResolvedPackage, ResolvedTarget, TargetReference } from './types.js';

export function targetKey(reference: TargetReference): string {
  return `${reference.package}/${reference.target}`;
}

/**
 * A validated build graph. Owns its packages, targets and products;
 * everything reachable from it is frozen.
 */
export class PackageGraph {
  private readonly packagesById: ReadonlyMap<PackageIdentity, ResolvedPackage>;
  private readonly targetsByKey: ReadonlyMap<string, ResolvedTarget>;

  constructor(
    readonly root: PackageIdentity,
    /** Sorted by identity, root included */
    readonly packages: readonly ResolvedPackage[],
    /** Reachable modules, each after the modules it depends on */
    readonly modules: readonly Module[],
    /** Root target name to the module names it needs, dependency-first */
    private readonly closures: ReadonlyMap<string, readonly string[]>
  ) {
    this.packagesById = new Map(packages.map(pkg => [pkg.identity, pkg]));
    this.targetsByKey = new Map(packages.flatMap(pkg => pkg.targets.map(target => [
      targetKey({ package: target.package, target: target.name }),
      target
    ] as const)));
    Object.freeze(this);
  }

  get rootPackage(): ResolvedPackage | undefined {
    return this.packagesById.get(this.root);
  }

  get rootTargets(): readonly string[] {
    return [...this.closures.keys()];
  }

  package(identity: PackageIdentity): ResolvedPackage | undefined {
    return this.packagesById.get(identity);
  }

  target(reference: TargetReference): ResolvedTarget | undefined {
    return this.targetsByKey.get(targetKey(reference));
  }

  /** Modules a root target needs, itself last */
  modulesFor(rootTarget: string): readonly string[] | undefined {
    return this.closures.get(rootTarget);
  }
}
