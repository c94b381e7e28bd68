/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementation that routes to @clack/prompts
 * for interactive terminal sessions.
 */

import { log, spinner as clackSpinner } from '@clack/prompts';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage);
            isStarted = false;
          }
        },
      };
    },
  };
}
