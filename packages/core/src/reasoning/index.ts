/**
 * Reasoning Layer
 * Advisory root-cause analysis through a pluggable oracle
 */

export * from './types.js';
export { parseAnalysisResponse, stripCodeFence } from './response-parser.js';
export {
  ReasoningOracleAdapter,
  resolveOracleCapability,
  defaultAnalysis,
  tailLines,
  DEFAULT_RECOMMENDED_ACTION,
} from './oracle-adapter.js';
