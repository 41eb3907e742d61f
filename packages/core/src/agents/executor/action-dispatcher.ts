/**
 * Action Dispatcher
 * Maps a classified issue to the remediation action that addresses it.
 * The choice depends on the issue alone, never on the oracle's analysis.
 */

import { ACTION_KINDS, ISSUE_TYPES, createChildLogger, errorMessage, type Action, type Issue } from '@kubemend/shared';
import type { ClusterReader } from '@kubemend/kubernetes';
import type { DispatcherConfig } from './types.js';

const logger = createChildLogger({ component: 'ActionDispatcher' });

/**
 * Deployment name derived from a pod name when the owner chain cannot be
 * read: `web-7c9f8d-x2z1` → `web`, `web-x2z1` → `web`, `web` → `web`
 */
export function deploymentNameFromPod(pod: string): string {
  const segments = pod.split('-');
  if (segments.length >= 3) {
    return segments.slice(0, -2).join('-');
  }
  if (segments.length === 2) {
    return segments[0] ?? pod;
  }
  return pod;
}

export class ActionDispatcher {
  private cluster: ClusterReader;
  private config: DispatcherConfig;

  constructor(cluster: ClusterReader, config: DispatcherConfig) {
    this.cluster = cluster;
    this.config = config;
  }

  async dispatch(issue: Issue): Promise<Action | null> {
    switch (issue.type) {
      case ISSUE_TYPES.OOM_KILLED:
        return {
          kind: ACTION_KINDS.INCREASE_RESOURCE_LIMITS,
          deployment: await this.resolveDeployment(issue.pod, issue.namespace),
          namespace: issue.namespace,
          memoryLimit: this.config.memoryLimit,
          cpuLimit: this.config.cpuLimit,
        };

      case ISSUE_TYPES.HIGH_RESTART_COUNT:
      case ISSUE_TYPES.CRASH_LOOP_BACK_OFF:
        return { kind: ACTION_KINDS.DELETE_POD, pod: issue.pod, namespace: issue.namespace };

      case ISSUE_TYPES.POD_NOT_RUNNING:
        return {
          kind: ACTION_KINDS.RESTART_DEPLOYMENT,
          deployment: await this.resolveDeployment(issue.pod, issue.namespace),
          namespace: issue.namespace,
        };

      default:
        return null;
    }
  }

  /**
   * Deployment owning a pod, following pod → ReplicaSet → Deployment
   */
  async resolveDeployment(pod: string, namespace: string): Promise<string> {
    try {
      const podOwners = await this.cluster.getOwnerReferences('Pod', pod, namespace);
      const replicaSet = podOwners.find((owner) => owner.kind === 'ReplicaSet');

      if (replicaSet) {
        const replicaSetOwners = await this.cluster.getOwnerReferences('ReplicaSet', replicaSet.name, namespace);
        const deployment = replicaSetOwners.find((owner) => owner.kind === 'Deployment');
        if (deployment) {
          return deployment.name;
        }
      }

      logger.debug({ pod, namespace }, 'No deployment in owner chain, deriving name from pod');
    } catch (error) {
      logger.warn({ pod, namespace, error: errorMessage(error) }, 'Owner lookup failed, deriving name from pod');
    }

    return deploymentNameFromPod(pod);
  }
}
