import { join, resolve } from 'path';
import * as yaml from 'js-yaml';
import * as semver from 'semver';
import type { PackageBinding, PackageIdentity, PackageManifest, Result } from '../../types/index.js';
import type { ManifestError, ManifestProvider, ProviderError, VersionProvider } from './types.js';
import { FILE_PATTERNS, REGISTRY_DIRS } from '../../constants/index.js';
import { exists, isDirectory, listDirectories, readTextFile } from '../../utils/fs.js';
import { parseManifestText } from '../../utils/manifest-yml.js';
import { InvalidManifestError } from '../../utils/errors.js';
import { describeBinding } from '../requirement.js';
import { logger } from '../../utils/logger.js';

const log = logger.scoped('registry');

/**
 * Version and manifest provider backed by a registry directory:
 *
 *   <registry>/<identity>/<version>/graphpin.yml
 *   <registry>/<identity>/revisions/<revision>/graphpin.yml
 *   <registry>/<identity>/branches.yml          (branch: revision)
 *
 * Path bindings are read relative to the workspace directory instead.
 */
export class RegistryDirectoryProvider implements VersionProvider, ManifestProvider {
  constructor(
    private readonly registryRoot: string,
    private readonly workspaceDir: string
  ) {}

  async availableVersions(identity: PackageIdentity, signal?: AbortSignal): Promise<Result<string[], ProviderError>> {
    signal?.throwIfAborted();
    const packageDir = join(this.registryRoot, identity);
    if (!(await isDirectory(packageDir))) {
      log.debug(`No registry entry for ${identity}`);
      return { success: true, data: [] };
    }
    try {
      const entries = await listDirectories(packageDir);
      return { success: true, data: entries.filter(entry => semver.valid(entry) === entry) };
    } catch (error) {
      return this.providerError(identity, error);
    }
  }

  async resolveRevision(identity: PackageIdentity, branch: string, signal?: AbortSignal): Promise<Result<string, ProviderError>> {
    signal?.throwIfAborted();
    const branchesPath = join(this.registryRoot, identity, FILE_PATTERNS.BRANCHES_YML);
    if (!(await exists(branchesPath))) {
      return { success: false, error: { kind: 'provider-error', identity, message: `no branches published for ${identity}` } };
    }
    try {
      const branches: unknown = yaml.load(await readTextFile(branchesPath));
      const revision = typeof branches === 'object' && branches !== null
        ? Object.entries(branches).find(([name]) => name === branch)?.[1]
        : undefined;
      if (typeof revision !== 'string' && typeof revision !== 'number') {
        return { success: false, error: { kind: 'provider-error', identity, message: `unknown branch '${branch}'` } };
      }
      return { success: true, data: String(revision) };
    } catch (error) {
      return this.providerError(identity, error);
    }
  }

  async checkout(identity: PackageIdentity, binding: PackageBinding, signal?: AbortSignal): Promise<Result<string, ProviderError>> {
    signal?.throwIfAborted();
    const location = this.locationOf(identity, binding);
    if (!(await isDirectory(location))) {
      return { success: false, error: { kind: 'provider-error', identity, message: `nothing to check out at ${location}` } };
    }
    return { success: true, data: location };
  }

  async manifest(
    identity: PackageIdentity,
    binding: PackageBinding,
    signal?: AbortSignal
  ): Promise<Result<PackageManifest, ManifestError | ProviderError>> {
    signal?.throwIfAborted();
    const manifestPath = join(this.locationOf(identity, binding), FILE_PATTERNS.MANIFEST_YML);
    if (!(await exists(manifestPath))) {
      return {
        success: false,
        error: { kind: 'manifest-error', identity, binding, message: `no manifest for ${identity} ${describeBinding(binding)}` }
      };
    }
    try {
      const manifest = parseManifestText(await readTextFile(manifestPath), manifestPath);
      // The registry location decides the identity, not the name written inside
      return { success: true, data: { ...manifest, identity } };
    } catch (error) {
      if (error instanceof InvalidManifestError) {
        return { success: false, error: { kind: 'manifest-error', identity, binding, message: error.message } };
      }
      return this.providerError(identity, error);
    }
  }

  private locationOf(identity: PackageIdentity, binding: PackageBinding): string {
    switch (binding.kind) {
      case 'version':
        return join(this.registryRoot, identity, binding.version);
      case 'branch':
      case 'revision':
        return join(this.registryRoot, identity, REGISTRY_DIRS.REVISIONS, binding.revision);
      case 'path':
        return resolve(this.workspaceDir, binding.path);
    }
  }

  private providerError(identity: PackageIdentity, error: unknown): { success: false; error: ProviderError } {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Registry read failed for ${identity}`, { message });
    return { success: false, error: { kind: 'provider-error', identity, message } };
  }
}
