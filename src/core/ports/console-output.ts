/**
 * Console output for CI, piped stdout and tests: one console.log line per
 * call, spinners reduced to their start and stop lines.
 */

import type { OutputPort, ProgressSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },

  note(content: string, title: string): void {
    console.log(`\n${title}\n${content}`);
  },

  spinner(): ProgressSpinner {
    return {
      start(message: string) {
        console.log(`… ${message}`);
      },
      stop(finalMessage: string) {
        console.log(`✓ ${finalMessage}`);
      }
    };
  }
};
