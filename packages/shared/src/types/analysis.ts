/**
 * Advisory root-cause analysis produced by the reasoning oracle
 * or by its deterministic fallback
 */

export const RISK_LEVELS = ['low', 'medium', 'high'] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

export interface Analysis {
  rootCause: string;
  recommendedAction: string;
  riskLevel: RiskLevel;
  explanation: string;
  /** Where the analysis came from; never used to choose an action */
  source: 'oracle' | 'fallback';
}
