/**
 * Remediation executor types
 * Safety decisions, resource keys and the configuration of the
 * dispatcher, governor and executor
 */

import { ACTION_KINDS, type Action, type ActionKind } from '@kubemend/shared';

/**
 * Error reported on every action the safety governor turns down
 */
export const SAFETY_DENIAL_MESSAGE = 'Rate limited or in cooldown';

export type DenialReason = 'rate_limited' | 'cooldown';

export type SafetyDecision =
  | { approved: true }
  | { approved: false; reason: DenialReason; retryAfterMs: number };

export interface SafetyGovernorConfig {
  /** Approvals allowed across all resources in any trailing hour */
  maxActionsPerHour: number;
  /** Minimum time between two approvals on the same resource key */
  cooldownSeconds: number;
}

export interface DispatcherConfig {
  /** Memory quantity applied to OOM-killed deployments, e.g. `256Mi` */
  memoryLimit: string;
  /** CPU quantity applied to OOM-killed deployments, e.g. `200m` */
  cpuLimit: string;
}

const RESOURCE_KEY_PREFIXES: Record<ActionKind, string> = {
  [ACTION_KINDS.SCALE_DEPLOYMENT]: 'scale',
  [ACTION_KINDS.INCREASE_RESOURCE_LIMITS]: 'limits',
  [ACTION_KINDS.RESTART_DEPLOYMENT]: 'restart',
  [ACTION_KINDS.DELETE_POD]: 'delete',
};

/**
 * Cooldown key of an action: `<kind>:<namespace>/<name>`
 */
export function resourceKey(action: Action): string {
  const name = action.kind === ACTION_KINDS.DELETE_POD ? action.pod : action.deployment;
  return `${RESOURCE_KEY_PREFIXES[action.kind]}:${action.namespace}/${name}`;
}
