/**
 * Prompt templates for the Gemini API
 */

import type { RootCauseRequest } from '../client/types.js';

export interface PromptTemplate<P> {
  system: string;
  build: (params: P) => string;
}

/**
 * Root-cause analysis of a single classified pod issue
 */
export const ROOT_CAUSE_PROMPT: PromptTemplate<RootCauseRequest> = {
  system: `You are an expert Kubernetes SRE assisting an automated remediation agent.

Analyze the issue and recent pod logs you are given, then explain the most likely root cause.
The agent has already chosen its remediation; your analysis is recorded in the incident report.

Response format (JSON only, no prose, no code fences):
{
  "root_cause": "string",
  "recommended_action": "string",
  "risk_level": "low|medium|high",
  "explanation": "string"
}`,

  build: ({ issue, logs }: RootCauseRequest): string => {
    const issueData = JSON.stringify({ ...issue, detectedAt: issue.detectedAt.toISOString() }, null, 2);

    return `Analyze the following Kubernetes issue.

Issue Data:
${issueData}

Recent Pod Logs:
${logs.trim() || '(no logs available)'}

Respond ONLY with valid JSON.`;
  },
};
