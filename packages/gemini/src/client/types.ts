/**
 * Gemini API client types
 */

import type { Issue } from '@kubemend/shared';

/**
 * Gemini model identifiers
 */
export const GEMINI_MODELS = {
  FLASH: 'gemini-2.0-flash-001',
} as const;

/**
 * Client configuration. Either an API key, or Vertex AI with a project.
 */
export interface GeminiClientConfig {
  apiKey?: string;
  /** Route requests through Vertex AI instead of the Gemini Developer API */
  vertexai?: boolean;
  project?: string;
  location?: string;
  /** Any model id (default: GEMINI_MODELS.FLASH) */
  model?: string;
  /** Default temperature for responses (0.0-2.0, default: 0.1) */
  defaultTemperature?: number;
  /** Transport-level request timeout in milliseconds (default: 30000) */
  requestTimeoutMs?: number;
}

/**
 * Request options for content generation
 */
export interface GenerateOptions {
  model?: string;
  systemInstruction?: string;
  responseFormat?: 'json' | 'text';
  temperature?: number;
  /** Cancels the in-flight request when aborted */
  signal?: AbortSignal;
}

/**
 * Input to a root-cause analysis
 */
export interface RootCauseRequest {
  issue: Issue;
  /** Recent log lines of the affected pod, already bounded by the caller */
  logs: string;
}
