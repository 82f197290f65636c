import * as semver from 'semver';
import type { PackageBinding, PackageIdentity, PackageManifest, Result } from '../../types/index.js';
import type { ManifestError, ProviderError, Providers } from './types.js';
import { bindingKey } from '../requirement.js';
import { logger } from '../../utils/logger.js';

const log = logger.scoped('providers');

/**
 * Thrown at a suspension point once the call's AbortSignal has fired.
 * Never escapes the resolver or the graph builder; they turn it into a `cancelled` result.
 */
export class CancelledError extends Error {
  constructor() {
    super('Operation cancelled');
    this.name = 'CancelledError';
  }
}

function describeThrown(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Per-call memoization of provider queries.
 *
 * Each key is fetched exactly once: the first caller starts the query and
 * stores its promise, concurrent callers await the same promise. Stored
 * promises never reject; a throwing provider becomes a provider-error result.
 * Owned by one resolve/build call and cleared when it ends.
 */
export class ProviderCache {
  private readonly versionLists = new Map<PackageIdentity, Promise<Result<string[], ProviderError>>>();
  private readonly revisions = new Map<string, Promise<Result<string, ProviderError>>>();
  private readonly manifests = new Map<string, Promise<Result<PackageManifest, ManifestError | ProviderError>>>();
  private readonly settledVersions = new Map<PackageIdentity, string[]>();

  constructor(
    private readonly providers: Providers,
    readonly signal?: AbortSignal
  ) {}

  /**
   * Valid semver versions of a package, newest first
   */
  async availableVersions(identity: PackageIdentity): Promise<Result<string[], ProviderError>> {
    let pending = this.versionLists.get(identity);
    if (!pending) {
      log.debug(`Fetching versions of ${identity}`);
      pending = this.guard(identity, async (): Promise<Result<string[], ProviderError>> => {
        const result = await this.providers.versions.availableVersions(identity, this.signal);
        if (!result.success) return result;
        const versions = [...new Set(result.data.map(v => semver.valid(v)).filter((v): v is string => v !== null))]
          .sort(semver.rcompare);
        this.settledVersions.set(identity, versions);
        return { success: true, data: versions };
      });
      this.versionLists.set(identity, pending);
    }
    return this.checkpoint(pending);
  }

  async resolveRevision(identity: PackageIdentity, branch: string): Promise<Result<string, ProviderError>> {
    const key = `${identity}#${branch}`;
    let pending = this.revisions.get(key);
    if (!pending) {
      log.debug(`Resolving head of ${identity} branch ${branch}`);
      pending = this.guard(identity, () => this.providers.versions.resolveRevision(identity, branch, this.signal));
      this.revisions.set(key, pending);
    }
    return this.checkpoint(pending);
  }

  async manifest(
    identity: PackageIdentity,
    binding: PackageBinding
  ): Promise<Result<PackageManifest, ManifestError | ProviderError>> {
    const key = `${identity}@${bindingKey(binding)}`;
    let pending = this.manifests.get(key);
    if (!pending) {
      log.debug(`Fetching manifest of ${key}`);
      pending = this.guard(identity, () => this.providers.manifests.manifest(identity, binding, this.signal));
      this.manifests.set(key, pending);
    }
    return this.checkpoint(pending);
  }

  /** A version list that has already arrived, without querying */
  peekVersions(identity: PackageIdentity): string[] | undefined {
    return this.settledVersions.get(identity);
  }

  /** Throws CancelledError if the signal has already fired */
  throwIfCancelled(): void {
    if (this.signal?.aborted) {
      throw new CancelledError();
    }
  }

  clear(): void {
    this.versionLists.clear();
    this.revisions.clear();
    this.manifests.clear();
    this.settledVersions.clear();
  }

  private async guard<T, E>(
    identity: PackageIdentity,
    query: () => Promise<Result<T, E>>
  ): Promise<Result<T, E | ProviderError>> {
    try {
      return await query();
    } catch (error) {
      log.debug(`Provider threw for ${identity}`, { error: describeThrown(error) });
      return { success: false, error: { kind: 'provider-error', identity, message: describeThrown(error) } };
    }
  }

  /**
   * Await a stored query, rejecting with CancelledError as soon as the signal fires.
   */
  private checkpoint<T>(pending: Promise<T>): Promise<T> {
    const signal = this.signal;
    if (!signal) return pending;
    if (signal.aborted) return Promise.reject(new CancelledError());

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(new CancelledError());
      signal.addEventListener('abort', onAbort, { once: true });
      pending.then(
        value => {
          signal.removeEventListener('abort', onAbort);
          if (signal.aborted) {
            reject(new CancelledError());
          } else {
            resolve(value);
          }
        },
        error => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }
}
