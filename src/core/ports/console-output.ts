/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console implementation of OutputPort. Status goes to stderr so that
 * rendered results on stdout can be piped.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.error(message);
  },

  warn(message: string): void {
    console.error(`⚠ ${message}`);
  },

  spinner(): UnifiedSpinner {
    let msg = '';
    return {
      start(message: string) {
        msg = message;
        console.error(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.error(`✓ ${finalMessage ?? msg}`);
      },
    };
  },
};
