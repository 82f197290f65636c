/**
 * Collaborator interfaces consumed by the resolver and the graph builder.
 * Implementations do the I/O; the core only queries them.
 */

import type { PackageBinding, PackageIdentity, PackageManifest, Result } from '../../types/index.js';

/** A transient fetch failure. Surfaced to the caller, never retried by the core. */
export interface ProviderError {
  kind: 'provider-error';
  identity: PackageIdentity;
  message: string;
}

/** A malformed or unreadable manifest for one binding of a package */
export interface ManifestError {
  kind: 'manifest-error';
  identity: PackageIdentity;
  binding: PackageBinding;
  message: string;
}

export interface VersionProvider {
  /**
   * Versions published for a package. An unknown package yields an empty list.
   * Order is not significant; callers sort.
   */
  availableVersions(identity: PackageIdentity, signal?: AbortSignal): Promise<Result<string[], ProviderError>>;

  /** Current head revision of a branch */
  resolveRevision(identity: PackageIdentity, branch: string, signal?: AbortSignal): Promise<Result<string, ProviderError>>;

  /** Source location of a binding. Only downstream build execution needs this. */
  checkout(identity: PackageIdentity, binding: PackageBinding, signal?: AbortSignal): Promise<Result<string, ProviderError>>;
}

export interface ManifestProvider {
  manifest(
    identity: PackageIdentity,
    binding: PackageBinding,
    signal?: AbortSignal
  ): Promise<Result<PackageManifest, ManifestError | ProviderError>>;
}

export interface Providers {
  versions: VersionProvider;
  manifests: ManifestProvider;
}
