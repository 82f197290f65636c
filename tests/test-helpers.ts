import { setTimeout as delay } from 'node:timers/promises';
import type {
  DependencyDeclaration,
  PackageBinding,
  PackageIdentity,
  PackageManifest,
  ProductDescription,
  Result,
  TargetDescription
} from '../src/types/index.js';
import type { ManifestError, ManifestProvider, ProviderError, Providers, VersionProvider } from '../src/core/providers/types.js';
import { bindingKey, parseRequirement, type RequirementFields } from '../src/core/requirement.js';

/** Dependency on `identity` with the requirement written as in graphpin.yml */
export function dep(identity: PackageIdentity, fields: RequirementFields | string): DependencyDeclaration {
  const requirement = parseRequirement(typeof fields === 'string' ? { version: fields } : fields);
  return { identity, requirement };
}

export interface ManifestInit {
  name?: string;
  dependencies?: DependencyDeclaration[];
  targets?: TargetDescription[];
  products?: ProductDescription[];
  platforms?: Record<string, string>;
  replaces?: PackageIdentity[];
}

export function manifest(identity: PackageIdentity, init: ManifestInit = {}): PackageManifest {
  return {
    identity,
    name: init.name ?? identity,
    platforms: init.platforms ?? {},
    dependencies: init.dependencies ?? [],
    targets: init.targets ?? [],
    products: init.products ?? [],
    replaces: init.replaces ?? []
  };
}

/** A regular target whose dependencies are written by name */
export function target(name: string, dependencies: string[] = []): TargetDescription {
  return { name, kind: 'regular', dependencies: dependencies.map(dependency => ({ kind: 'by-name', name: dependency })) };
}

export function library(name: string, targets: string[] = [name]): ProductDescription {
  return { name, kind: 'library', targets };
}

type Entry = PackageManifest | { broken: string };

/**
 * In-memory registry implementing both provider interfaces. Counts every
 * query so tests can assert memoization, and can delay or fail on demand.
 */
export class FakeRegistry implements VersionProvider, ManifestProvider {
  readonly versionQueries = new Map<PackageIdentity, number>();
  readonly manifestQueries = new Map<string, number>();
  readonly revisionQueries = new Map<string, number>();
  /** Identities whose version list fails with a provider error */
  readonly failingVersions = new Set<PackageIdentity>();
  /** Milliseconds every query waits before answering */
  latency = 0;

  private readonly versionEntries = new Map<PackageIdentity, Map<string, Entry>>();
  private readonly otherEntries = new Map<string, Entry>();
  private readonly branches = new Map<string, string>();

  get providers(): Providers {
    return { versions: this, manifests: this };
  }

  publish(identity: PackageIdentity, version: string, init: ManifestInit = {}): this {
    this.versionsOf(identity).set(version, manifest(identity, init));
    return this;
  }

  publishBroken(identity: PackageIdentity, version: string, message: string): this {
    this.versionsOf(identity).set(version, { broken: message });
    return this;
  }

  publishRevision(identity: PackageIdentity, revision: string, init: ManifestInit = {}): this {
    this.otherEntries.set(`${identity}@${bindingKey({ kind: 'revision', revision })}`, manifest(identity, init));
    return this;
  }

  /** Point a branch at a revision published with publishRevision */
  setBranch(identity: PackageIdentity, branch: string, revision: string): this {
    this.branches.set(`${identity}#${branch}`, revision);
    return this;
  }

  publishPath(identity: PackageIdentity, path: string, init: ManifestInit = {}): this {
    this.otherEntries.set(`${identity}@${bindingKey({ kind: 'path', path })}`, manifest(identity, init));
    return this;
  }

  totalVersionQueries(): number {
    return [...this.versionQueries.values()].reduce((sum, count) => sum + count, 0);
  }

  async availableVersions(identity: PackageIdentity): Promise<Result<string[], ProviderError>> {
    this.versionQueries.set(identity, (this.versionQueries.get(identity) ?? 0) + 1);
    await this.wait();
    if (this.failingVersions.has(identity)) {
      return { success: false, error: { kind: 'provider-error', identity, message: 'registry unavailable' } };
    }
    return { success: true, data: [...(this.versionEntries.get(identity)?.keys() ?? [])] };
  }

  async resolveRevision(identity: PackageIdentity, branch: string): Promise<Result<string, ProviderError>> {
    const key = `${identity}#${branch}`;
    this.revisionQueries.set(key, (this.revisionQueries.get(key) ?? 0) + 1);
    await this.wait();
    const revision = this.branches.get(key);
    if (revision === undefined) {
      return { success: false, error: { kind: 'provider-error', identity, message: `unknown branch '${branch}'` } };
    }
    return { success: true, data: revision };
  }

  async checkout(identity: PackageIdentity, binding: PackageBinding): Promise<Result<string, ProviderError>> {
    return { success: true, data: `/checkouts/${identity}/${bindingKey(binding)}` };
  }

  async manifest(
    identity: PackageIdentity,
    binding: PackageBinding
  ): Promise<Result<PackageManifest, ManifestError | ProviderError>> {
    const key = `${identity}@${bindingKey(binding)}`;
    this.manifestQueries.set(key, (this.manifestQueries.get(key) ?? 0) + 1);
    await this.wait();
    // A branch binding reads the manifest of the revision it points at
    const entry = binding.kind === 'version'
      ? this.versionEntries.get(identity)?.get(binding.version)
      : binding.kind === 'branch'
        ? this.otherEntries.get(`${identity}@${bindingKey({ kind: 'revision', revision: binding.revision })}`)
        : this.otherEntries.get(key);
    if (!entry) {
      return { success: false, error: { kind: 'manifest-error', identity, binding, message: `no manifest for ${key}` } };
    }
    if ('broken' in entry) {
      return { success: false, error: { kind: 'manifest-error', identity, binding, message: entry.broken } };
    }
    return { success: true, data: entry };
  }

  private versionsOf(identity: PackageIdentity): Map<string, Entry> {
    let versions = this.versionEntries.get(identity);
    if (!versions) {
      versions = new Map();
      this.versionEntries.set(identity, versions);
    }
    return versions;
  }

  private async wait(): Promise<void> {
    if (this.latency > 0) {
      await delay(this.latency);
    }
  }
}
