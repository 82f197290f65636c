import { join, resolve } from 'path';
import type { Command } from 'commander';

import { GraphpinError, type PackageManifest } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { createCliContext, type CliContext } from '../cli/context.js';
import { configManager } from '../core/config.js';
import { loadPackageGraph, type LoadedWorkspace, type WorkspaceError } from '../core/workspace.js';
import { RegistryDirectoryProvider } from '../core/providers/registry-directory-provider.js';
import { describeResolutionError } from '../core/resolution/errors.js';
import { describeGraphError } from '../core/graph/errors.js';
import { exists } from '../utils/fs.js';
import { parseManifestFile } from '../utils/manifest-yml.js';
import { ConfigError, GraphValidationError, ResolutionFailedError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface WorkspaceCommandOptions {
  update?: boolean;
}

export interface WorkspaceRun {
  ctx: CliContext;
  manifest: PackageManifest;
  lockfilePath: string;
  workspace: LoadedWorkspace;
}

/**
 * Convert a tagged workspace failure into the error class the CLI prints
 */
export function toCommandError(failure: WorkspaceError): GraphpinError {
  if (failure.stage === 'resolution') {
    return new ResolutionFailedError(describeResolutionError(failure.error), { kind: failure.error.kind });
  }
  return new GraphValidationError(describeGraphError(failure.error), { kind: failure.error.kind });
}

/**
 * Shared flow of `resolve` and `graph`: read the workspace manifest, merge
 * settings, then reconcile/resolve and build. Ctrl-C aborts the run without
 * touching the lockfile.
 */
export async function runWorkspaceCommand(options: WorkspaceCommandOptions, command: Command): Promise<WorkspaceRun> {
  const globalOpts: { cwd?: string; registry?: string; platform?: string } = command.optsWithGlobals();
  const ctx = createCliContext({ cwd: globalOpts.cwd });

  const manifestPath = join(ctx.cwd, FILE_PATTERNS.MANIFEST_YML);
  if (!(await exists(manifestPath))) {
    throw new ValidationError(`No ${FILE_PATTERNS.MANIFEST_YML} found in ${ctx.cwd}`);
  }
  const manifest = await parseManifestFile(manifestPath);

  const settings = await configManager.resolveSettings({
    registry: globalOpts.registry,
    platform: globalOpts.platform
  });
  if (!settings.registry) {
    throw new ConfigError(
      'No registry configured. Pass --registry, set GRAPHPIN_REGISTRY, or add "registry" to the graphpin config file.'
    );
  }

  const registryRoot = resolve(ctx.cwd, settings.registry);
  const provider = new RegistryDirectoryProvider(registryRoot, ctx.cwd);
  const lockfilePath = join(ctx.cwd, settings.lockfileName);
  logger.debug('Running workspace command', { registryRoot, lockfilePath, platform: settings.platform });

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  const spinner = ctx.output.spinner();
  spinner.start(`Resolving ${manifest.name}`);
  try {
    const result = await loadPackageGraph(manifest, {
      providers: { versions: provider, manifests: provider },
      lockfilePath,
      platform: settings.platform,
      signal: controller.signal,
      update: options.update
    }).catch((error: unknown) => {
      spinner.stop('Resolution failed');
      throw error;
    });
    if (!result.success) {
      spinner.stop('Resolution failed');
      throw toCommandError(result.error);
    }
    spinner.stop(result.data.fastPath ? 'Lockfile is up to date' : `Resolved ${result.data.solution.packages.length} package(s)`);
    return { ctx, manifest, lockfilePath, workspace: result.data };
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
