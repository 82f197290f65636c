/**
 * Terminal output through @clack/prompts: log lines with status symbols,
 * boxed notes and an animated spinner while resolving.
 */

import { log, spinner as clackSpinner, note as clackNote } from '@clack/prompts';
import type { OutputPort, ProgressSpinner } from '../core/ports/output.js';

export function createClackOutput(): OutputPort {
  return {
    info: message => log.info(message),
    message: message => log.message(message),
    success: message => log.success(message),
    note: (content, title) => clackNote(content, title),

    spinner(): ProgressSpinner {
      const s = clackSpinner();
      let running = false;
      return {
        start(message: string) {
          if (running) return;
          s.start(message);
          running = true;
        },
        stop(finalMessage: string) {
          if (!running) return;
          s.stop(finalMessage);
          running = false;
        }
      };
    }
  };
}
