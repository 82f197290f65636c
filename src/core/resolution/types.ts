import type { PackageBinding, PackageIdentity, RequirementKind } from '../../types/index.js';
import type { ManifestError, ProviderError } from '../providers/types.js';
import type { ProviderCache } from '../providers/provider-cache.js';
import type { Lockfile } from '../lockfile/lockfile.js';
import type { Incompatibility } from './incompatibility.js';

export interface SolutionEntry {
  identity: PackageIdentity;
  binding: PackageBinding;
  /** Kind of requirement that produced the binding, recorded in lockfile pins */
  requirementKind: RequirementKind;
}

/**
 * Identity to binding, ordered by identity. Outlives the resolve call.
 */
export interface Solution {
  readonly packages: readonly Readonly<SolutionEntry>[];
}

export type ResolutionError =
  | {
      kind: 'version-conflict';
      incompatibility: Incompatibility;
      explanation: string;
      /** Every package named by the external facts of the derivation */
      packages: PackageIdentity[];
    }
  | { kind: 'package-not-found'; identity: PackageIdentity; explanation: string }
  | { kind: 'no-usable-version'; identity: PackageIdentity; failures: ManifestError[] }
  | ProviderError
  | { kind: 'cancelled' };

export interface ResolveOptions {
  /** Pins preferred when they still fit the constraints */
  lockfile?: Lockfile;
  signal?: AbortSignal;
  /** Share a provider cache with a later graph build; the caller owns and clears it */
  cache?: ProviderCache;
  /** Name of the root package in explanations */
  rootName?: string;
}
