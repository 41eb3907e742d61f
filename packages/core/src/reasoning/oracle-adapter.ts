/**
 * Reasoning Oracle Adapter
 * Obtains an advisory root-cause analysis for an issue. Any oracle problem
 * (absent, failing, slow or unparseable) degrades to a fixed default.
 */

import {
  OracleTimeoutError,
  createChildLogger,
  errorMessage,
  type Analysis,
  type Config,
  type Issue,
} from '@kubemend/shared';
import { GeminiClient, type RootCauseRequest } from '@kubemend/gemini';
import { parseAnalysisResponse } from './response-parser.js';
import type { OracleAdapterConfig, OracleCapability, RootCauseOracle } from './types.js';

const logger = createChildLogger({ component: 'ReasoningOracleAdapter' });

export const DEFAULT_RECOMMENDED_ACTION = 'apply_default_healing';

/**
 * Analysis used whenever the oracle cannot provide one
 */
export function defaultAnalysis(issue: Issue, explanation: string): Analysis {
  return {
    rootCause: `Detected ${issue.type} issue`,
    recommendedAction: DEFAULT_RECOMMENDED_ACTION,
    riskLevel: 'medium',
    explanation,
    source: 'fallback',
  };
}

/**
 * Last `count` lines of a log
 */
export function tailLines(logs: string, count: number): string {
  return logs.trimEnd().split('\n').slice(-count).join('\n');
}

/**
 * Decide once whether a Gemini oracle can be used
 */
export function resolveOracleCapability(config: Config['oracle']): OracleCapability {
  if (!config.enabled) {
    return { kind: 'absent', reason: 'disabled by configuration' };
  }

  try {
    const oracle = new GeminiClient({
      apiKey: config.apiKey,
      vertexai: config.vertexai,
      project: config.project,
      location: config.location,
      model: config.model,
      requestTimeoutMs: config.timeoutMs,
    });
    return { kind: 'present', oracle };
  } catch (error) {
    const reason = errorMessage(error);
    logger.warn({ reason }, 'Reasoning oracle unavailable, using rule-based analysis');
    return { kind: 'absent', reason };
  }
}

export class ReasoningOracleAdapter {
  private capability: OracleCapability;
  private config: OracleAdapterConfig;

  constructor(capability: OracleCapability, config: OracleAdapterConfig) {
    this.capability = capability;
    this.config = config;
  }

  get available(): boolean {
    return this.capability.kind === 'present';
  }

  async analyze(issue: Issue, logs: string): Promise<Analysis> {
    if (this.capability.kind === 'absent') {
      return defaultAnalysis(
        issue,
        `AI analysis unavailable (${this.capability.reason}); applying rule-based healing.`
      );
    }

    try {
      const text = await this.callWithTimeout(this.capability.oracle, {
        issue,
        logs: tailLines(logs, this.config.logTailLines),
      });
      const analysis = parseAnalysisResponse(text);
      logger.info(
        { pod: issue.pod, namespace: issue.namespace, rootCause: analysis.rootCause, riskLevel: analysis.riskLevel },
        'Oracle analysis received'
      );
      return analysis;
    } catch (error) {
      const message = errorMessage(error);
      logger.warn({ pod: issue.pod, namespace: issue.namespace, error: message }, 'Oracle analysis failed');
      return defaultAnalysis(issue, `AI analysis error: ${message}. Applying rule-based healing.`);
    }
  }

  private async callWithTimeout(oracle: RootCauseOracle, request: RootCauseRequest): Promise<string> {
    const { timeoutMs } = this.config;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new OracleTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([oracle.analyzeRootCause(request, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
