/**
 * Reasoning types
 */

import type { RootCauseRequest } from '@kubemend/gemini';

/**
 * Anything that can explain an issue. Returns free-form text expected to
 * embed the analysis JSON, optionally inside a fenced code block.
 */
export interface RootCauseOracle {
  analyzeRootCause(request: RootCauseRequest, signal?: AbortSignal): Promise<string>;
}

/**
 * Whether an oracle is available, decided once at startup
 */
export type OracleCapability =
  | { kind: 'present'; oracle: RootCauseOracle }
  | { kind: 'absent'; reason: string };

export interface OracleAdapterConfig {
  /** Upper bound on a single oracle call */
  timeoutMs: number;
  /** Log lines forwarded to the oracle */
  logTailLines: number;
}
