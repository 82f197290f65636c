import type {
  PackageBinding,
  PackageIdentity,
  PackageManifest,
  ProductKind,
  TargetKind
} from '../../types/index.js';
import type { ProviderError } from '../providers/types.js';
import type { ProviderCache } from '../providers/provider-cache.js';

export interface TargetReference {
  package: PackageIdentity;
  target: string;
}

export interface ResolvedTarget {
  readonly package: PackageIdentity;
  readonly name: string;
  readonly kind: TargetKind;
  /** Module the target compiles to */
  readonly moduleName: string;
  /** Resolved target edges, same package or through products, in declaration order */
  readonly dependencies: readonly Readonly<TargetReference>[];
}

export interface ResolvedProduct {
  readonly package: PackageIdentity;
  readonly name: string;
  readonly kind: ProductKind;
  readonly targets: readonly string[];
}

export interface ResolvedPackage {
  readonly identity: PackageIdentity;
  readonly name: string;
  readonly binding: PackageBinding;
  readonly isRoot: boolean;
  readonly platforms: Readonly<Record<string, string>>;
  readonly targets: readonly ResolvedTarget[];
  readonly products: readonly ResolvedProduct[];
}

export interface Module {
  readonly name: string;
  readonly kind: TargetKind;
  readonly target: Readonly<TargetReference>;
}

export type GraphError =
  | {
      kind: 'duplicate-module';
      module: string;
      packages: PackageIdentity[];
      /** Every target that compiles to the module, possibly several of one package */
      targets: TargetReference[];
    }
  | { kind: 'unresolved-product-reference'; package: PackageIdentity; target: string; product: string; dependency: PackageIdentity }
  | { kind: 'unresolved-target-reference'; package: PackageIdentity; target: string; dependency: string }
  | { kind: 'dependency-cycle'; path: TargetReference[] }
  | {
      kind: 'incompatible-platform';
      package: PackageIdentity;
      dependency: PackageIdentity;
      platform: string;
      /** Minimum the dependency declares */
      required: string;
      /** Minimum the dependant declares */
      declared: string;
    }
  | { kind: 'manifest-unavailable'; identity: PackageIdentity; message: string }
  | ProviderError
  | { kind: 'cancelled' };

export interface BuildOptions {
  /** Manifest of the package being built */
  root: PackageManifest;
  /** Build platform; dependencies conditioned on other platforms are skipped */
  platform?: string;
  signal?: AbortSignal;
  /** Share a provider cache with the resolve step; the caller owns and clears it */
  cache?: ProviderCache;
}
