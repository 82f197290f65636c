/**
 * CLI Context Factory
 *
 * Builds the context command handlers run with: the working directory and
 * the output port matching the session.
 */

import { resolve } from 'path';
import { createClackOutput } from './clack-output-adapter.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';

export interface CliContext {
  cwd: string;
  output: OutputPort;
}

export interface CliContextOptions {
  cwd?: string;
}

let cachedClackOutput: OutputPort | undefined;

/** Rich output only on a terminal outside CI */
function isInteractive(): boolean {
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

export function createCliContext(options: CliContextOptions = {}): CliContext {
  let output = consoleOutput;
  if (isInteractive()) {
    cachedClackOutput ??= createClackOutput();
    output = cachedClackOutput;
  }
  return {
    cwd: resolve(options.cwd ?? process.cwd()),
    output
  };
}
