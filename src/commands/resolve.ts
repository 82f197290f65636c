import { Command } from 'commander';

import { ResolveCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatSolution } from '../utils/formatters.js';
import { describeStaleReason } from '../core/lockfile/reconcile.js';
import { runWorkspaceCommand } from './workspace-command.js';

/**
 * Reconcile the lockfile, resolve when it is stale, and print the pins
 */
async function resolveCommand(options: ResolveCommandOptions, command: Command): Promise<void> {
  const { ctx, lockfilePath, workspace } = await runWorkspaceCommand(options, command);
  const { output } = ctx;

  for (const reason of workspace.staleReasons) {
    output.info(`Lockfile is stale: ${describeStaleReason(reason)}`);
  }

  const lines = formatSolution(workspace.solution);
  if (lines.length === 0) {
    output.message('No dependencies');
  } else {
    output.note(lines.join('\n'), 'Resolved packages');
  }

  if (workspace.lockfileWritten) {
    output.success(`Wrote ${lockfilePath}`);
  }
}

export function setupResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve dependencies of graphpin.yml and write the lockfile')
    .option('-u, --update', 'ignore pinned versions and resolve from scratch')
    .action(withErrorHandling(async (options: ResolveCommandOptions, command: Command) => {
      await resolveCommand(options, command);
    }));
}
