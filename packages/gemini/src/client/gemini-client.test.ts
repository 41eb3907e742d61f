/**
 * Gemini Client Tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConfigurationError, OracleError, OracleResponseError, ISSUE_TYPES, type Issue } from '@kubemend/shared';
import { GeminiClient } from './gemini-client.js';
import { GEMINI_MODELS } from './types.js';
import { ROOT_CAUSE_PROMPT } from '../prompts/index.js';

const mockGenerateContent = vi.fn();
const mockConstructor = vi.fn();

// Mock the GoogleGenAI SDK
vi.mock('@google/genai', () => {
  return {
    GoogleGenAI: class MockGoogleGenAI {
      models = {
        generateContent: mockGenerateContent,
      };
      constructor(options: unknown) {
        mockConstructor(options);
      }
    },
  };
});

const oomIssue: Issue = {
  type: ISSUE_TYPES.OOM_KILLED,
  severity: 'critical',
  pod: 'api-5d8f9c-abcde',
  namespace: 'prod',
  container: 'api',
  detectedAt: new Date('2024-05-01T12:00:00.000Z'),
};

describe('GeminiClient', () => {
  let client: GeminiClient;

  beforeEach(() => {
    vi.clearAllMocks();
    mockGenerateContent.mockReset();
    client = new GeminiClient({ apiKey: 'test-api-key' });
  });

  describe('constructor', () => {
    it('should default to the flash model', () => {
      expect(client.model).toBe(GEMINI_MODELS.FLASH);
      expect(mockConstructor).toHaveBeenCalledWith({
        apiKey: 'test-api-key',
        httpOptions: { timeout: 30000 },
      });
    });

    it('should configure Vertex AI with project and location', () => {
      new GeminiClient({ vertexai: true, project: 'test-project', location: 'europe-west1', requestTimeoutMs: 5000 });

      expect(mockConstructor).toHaveBeenLastCalledWith({
        vertexai: true,
        project: 'test-project',
        location: 'europe-west1',
        httpOptions: { timeout: 5000 },
      });
    });

    it('should reject Vertex AI without a project', () => {
      expect(() => new GeminiClient({ vertexai: true })).toThrow(ConfigurationError);
    });

    it('should reject a missing API key', () => {
      expect(() => new GeminiClient({})).toThrow('Gemini API key is not set');
    });
  });

  describe('generateText', () => {
    it('should return the trimmed response text', async () => {
      mockGenerateContent.mockResolvedValue({ text: '  hello  ' });

      await expect(client.generateText('ping')).resolves.toBe('hello');
    });

    it('should pass model, temperature and abort signal to the SDK', async () => {
      mockGenerateContent.mockResolvedValue({ text: 'ok' });
      const controller = new AbortController();

      await client.generateText('ping', {
        model: 'gemini-2.5-pro',
        temperature: 0.5,
        systemInstruction: 'be brief',
        signal: controller.signal,
      });

      expect(mockGenerateContent).toHaveBeenCalledWith({
        model: 'gemini-2.5-pro',
        contents: 'ping',
        config: {
          systemInstruction: 'be brief',
          temperature: 0.5,
          responseMimeType: 'text/plain',
          abortSignal: controller.signal,
        },
      });
    });

    it('should reject an empty response', async () => {
      mockGenerateContent.mockResolvedValue({ text: undefined });

      await expect(client.generateText('ping')).rejects.toBeInstanceOf(OracleResponseError);
    });

    it('should wrap SDK failures in OracleError', async () => {
      mockGenerateContent.mockRejectedValue(new Error('fetch failed'));

      const error = await client.generateText('ping').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OracleError);
      if (error instanceof OracleError) {
        expect(error.message).toBe('Gemini request failed: fetch failed');
        expect(error.code).toBe('E2001');
      }
    });
  });

  describe('analyzeRootCause', () => {
    it('should send the root-cause prompt as JSON request', async () => {
      mockGenerateContent.mockResolvedValue({ text: '{"root_cause":"leak"}' });

      const text = await client.analyzeRootCause({ issue: oomIssue, logs: 'java.lang.OutOfMemoryError' });

      expect(text).toBe('{"root_cause":"leak"}');
      const [request] = mockGenerateContent.mock.calls[0] ?? [];
      expect(request).toMatchObject({
        model: GEMINI_MODELS.FLASH,
        config: {
          systemInstruction: ROOT_CAUSE_PROMPT.system,
          responseMimeType: 'application/json',
          temperature: 0.1,
        },
      });
    });
  });
});

describe('ROOT_CAUSE_PROMPT', () => {
  it('should embed the issue as JSON and the logs', () => {
    const prompt = ROOT_CAUSE_PROMPT.build({ issue: oomIssue, logs: 'line 1\nline 2\n' });

    expect(prompt).toContain('"type": "OomKilled"');
    expect(prompt).toContain('"detectedAt": "2024-05-01T12:00:00.000Z"');
    expect(prompt).toContain('Recent Pod Logs:\nline 1\nline 2\n\nRespond ONLY with valid JSON.');
  });

  it('should say when no logs are available', () => {
    const prompt = ROOT_CAUSE_PROMPT.build({ issue: oomIssue, logs: '   ' });

    expect(prompt).toContain('Recent Pod Logs:\n(no logs available)\n');
  });
});
