/**
 * @kubemend/core
 * Observation, classification, reasoning, remediation and reporting
 */

// Observation
export * from './observers/index.js';

// Classification
export * from './detection/index.js';

// Reasoning oracle
export * from './reasoning/index.js';

// Dispatch, safety and execution
export * from './agents/executor/index.js';

// Reports
export * from './reporting/index.js';

// Status
export * from './status/index.js';

// Control loop
export * from './orchestrator/index.js';
