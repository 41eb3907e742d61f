/**
 * Gemini API Client
 * Uses @google/genai SDK
 * Includes OpenTelemetry tracing for production observability
 */

import { GoogleGenAI, type GenerateContentConfig } from '@google/genai';
import { trace, SpanStatusCode, type Span } from '@opentelemetry/api';
import {
  createChildLogger,
  ConfigurationError,
  OracleError,
  OracleResponseError,
  errorMessage,
} from '@kubemend/shared';
import type { GeminiClientConfig, GenerateOptions, RootCauseRequest } from './types.js';
import { GEMINI_MODELS } from './types.js';
import { ROOT_CAUSE_PROMPT } from '../prompts/index.js';

const DEFAULT_TEMPERATURE = 0.1; // Low temperature for consistent incident analysis
const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

const tracer = trace.getTracer('gemini-client', '1.0.0');

interface ResolvedConfig {
  model: string;
  defaultTemperature: number;
  requestTimeoutMs: number;
}

export class GeminiClient {
  private client: GoogleGenAI;
  private config: ResolvedConfig;
  private logger = createChildLogger({ component: 'GeminiClient' });

  constructor(config: GeminiClientConfig) {
    this.config = {
      model: config.model ?? GEMINI_MODELS.FLASH,
      defaultTemperature: config.defaultTemperature ?? DEFAULT_TEMPERATURE,
      requestTimeoutMs: config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    };

    const httpOptions = { timeout: this.config.requestTimeoutMs };

    if (config.vertexai) {
      if (!config.project) {
        throw new ConfigurationError('Vertex AI requires a GCP project', { setting: 'GCP_PROJECT' });
      }
      this.client = new GoogleGenAI({
        vertexai: true,
        project: config.project,
        location: config.location,
        httpOptions,
      });
    } else {
      if (!config.apiKey) {
        throw new ConfigurationError('Gemini API key is not set', { setting: 'GEMINI_API_KEY' });
      }
      this.client = new GoogleGenAI({ apiKey: config.apiKey, httpOptions });
    }

    this.logger.info(
      {
        model: this.config.model,
        backend: config.vertexai ? 'vertex-ai' : 'gemini-api',
        timeout: this.config.requestTimeoutMs,
      },
      'GeminiClient initialized'
    );
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Ask the model for a root-cause analysis of an issue.
   * Returns the raw response text; parsing and validation belong to the caller.
   */
  async analyzeRootCause(request: RootCauseRequest, signal?: AbortSignal): Promise<string> {
    return this.generateText(ROOT_CAUSE_PROMPT.build(request), {
      systemInstruction: ROOT_CAUSE_PROMPT.system,
      responseFormat: 'json',
      signal,
    });
  }

  /**
   * Single generateContent call wrapped in a `gemini.generate` span.
   * No retries: callers bound the call in time and degrade on failure.
   */
  async generateText(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const model = options.model ?? this.config.model;

    return tracer.startActiveSpan('gemini.generate', async (span) => {
      this.recordSpanAttributes(span, options, model);
      const start = Date.now();

      try {
        const config: GenerateContentConfig = {
          systemInstruction: options.systemInstruction,
          temperature: options.temperature ?? this.config.defaultTemperature,
          responseMimeType: options.responseFormat === 'json' ? 'application/json' : 'text/plain',
          abortSignal: options.signal,
        };

        const response = await this.client.models.generateContent({
          model,
          contents: prompt,
          config,
        });

        const durationMs = Date.now() - start;
        span.setAttribute('gemini.duration_ms', durationMs);

        const usage = response.usageMetadata;
        if (usage) {
          span.setAttribute('gemini.tokens.prompt', usage.promptTokenCount ?? 0);
          span.setAttribute('gemini.tokens.completion', usage.candidatesTokenCount ?? 0);
          span.setAttribute('gemini.tokens.total', usage.totalTokenCount ?? 0);
        }

        const text = response.text?.trim() ?? '';
        if (!text) {
          throw new OracleResponseError('Empty response from Gemini', { model });
        }

        this.logger.debug({ model, durationMs, length: text.length }, 'Gemini API call completed');
        span.setStatus({ code: SpanStatusCode.OK });
        return text;
      } catch (error) {
        const message = errorMessage(error);
        span.setAttribute('gemini.error', message.substring(0, 500));
        span.setStatus({ code: SpanStatusCode.ERROR, message });
        this.logger.warn({ model, durationMs: Date.now() - start, error: message }, 'Gemini API call failed');

        if (error instanceof OracleError) {
          throw error;
        }
        throw new OracleError(`Gemini request failed: ${message}`, 'E2001', {
          model,
          originalError: error instanceof Error ? error.name : undefined,
        });
      } finally {
        span.end();
      }
    });
  }

  private recordSpanAttributes(span: Span, options: GenerateOptions, model: string): void {
    span.setAttribute('gemini.model', model);
    span.setAttribute('gemini.temperature', options.temperature ?? this.config.defaultTemperature);
    if (options.responseFormat) {
      span.setAttribute('gemini.response_format', options.responseFormat);
    }
  }
}
