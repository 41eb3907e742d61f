/**
 * Oracle response parsing
 */

import { z } from 'zod';
import { OracleResponseError, RISK_LEVELS, type Analysis } from '@kubemend/shared';

const analysisResponseSchema = z.object({
  root_cause: z.string().min(1),
  recommended_action: z.string().min(1),
  risk_level: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(RISK_LEVELS)),
  explanation: z.string(),
});

const FENCE = '```';

/**
 * Remove a Markdown code fence wrapping the response. The opening line
 * (with its language tag) is dropped and everything from the last fence on,
 * including any trailing prose, is cut.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith(FENCE)) {
    return trimmed;
  }

  const firstNewline = trimmed.indexOf('\n');
  const body = firstNewline === -1 ? trimmed.slice(FENCE.length) : trimmed.slice(firstNewline + 1);
  const closing = body.lastIndexOf(FENCE);
  return (closing === -1 ? body : body.slice(0, closing)).trim();
}

/**
 * Parse and validate an oracle response into an Analysis
 * @throws OracleResponseError when the text is not JSON or misses required fields
 */
export function parseAnalysisResponse(text: string): Analysis {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(text));
  } catch {
    throw new OracleResponseError('Oracle response is not valid JSON', { response: text.substring(0, 200) });
  }

  const result = analysisResponseSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new OracleResponseError(`Oracle response failed validation: ${issues.join('; ')}`);
  }

  return {
    rootCause: result.data.root_cause,
    recommendedAction: result.data.recommended_action,
    riskLevel: result.data.risk_level,
    explanation: result.data.explanation,
    source: 'oracle',
  };
}
