/**
 * Executor module exports
 */

export * from './types.js';
export { SafetyGovernor } from './safety-governor.js';
export { ActionDispatcher, deploymentNameFromPod } from './action-dispatcher.js';
export { RemediationExecutor, type RemediationExecutorConfig } from './remediation-executor.js';
