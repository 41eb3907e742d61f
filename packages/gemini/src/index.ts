/**
 * @kubemend/gemini
 * Gemini API client for root-cause analysis
 */

export { GeminiClient } from './client/index.js';
export * from './client/types.js';
export * from './prompts/index.js';
