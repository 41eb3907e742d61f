/**
 * Core types for Kubemend
 */

export * from './issue.js';
export * from './analysis.js';
export * from './action.js';
export * from './incident.js';

/**
 * Version stamped into incident reports
 */
export const AGENT_VERSION = '1.0.0';
