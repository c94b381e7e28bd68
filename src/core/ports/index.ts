/**
 * Core Ports
 *
 * Output boundary between the resolver core and the terminal.
 */

export type { OutputPort, UnifiedSpinner } from './output.js';
export { consoleOutput } from './console-output.js';
