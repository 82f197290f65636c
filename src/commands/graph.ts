import { Command } from 'commander';

import { GraphCommandOptions } from '../types/index.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import { formatModules } from '../utils/formatters.js';
import { runWorkspaceCommand } from './workspace-command.js';

async function graphCommand(options: GraphCommandOptions, command: Command): Promise<void> {
  const { ctx, workspace } = await runWorkspaceCommand({}, command);
  const { graph } = workspace;

  if (options.target !== undefined && !graph.rootTargets.includes(options.target)) {
    throw new ValidationError(
      `Unknown target '${options.target}'. Root targets: ${graph.rootTargets.join(', ') || '(none)'}`
    );
  }

  const lines = formatModules(graph, options.target);
  if (lines.length === 0) {
    ctx.output.message('No targets');
    return;
  }
  ctx.output.note(lines.join('\n'), `Modules of ${graph.rootPackage?.name ?? graph.root}`);
}

export function setupGraphCommand(program: Command): void {
  program
    .command('graph')
    .description('Print the modules each root target builds, dependencies first')
    .option('--target <name>', 'only list the modules of this root target')
    .action(withErrorHandling(async (options: GraphCommandOptions, command: Command) => {
      await graphCommand(options, command);
    }));
}
