/**
 * Control Loop
 * Drives one remediation pass per tick
 */

export { ControlLoop } from './control-loop.js';
export type {
  ControlLoopConfig,
  ControlLoopDependencies,
  ControlLoopEvents,
  TickSummary,
} from './control-loop.js';
