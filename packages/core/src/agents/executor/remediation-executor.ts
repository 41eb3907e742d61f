/**
 * Remediation Executor
 * Carries out actions against the cluster, each gated by the safety governor
 */

import {
  ACTION_KINDS,
  KubernetesApiError,
  actionTarget,
  createChildLogger,
  describeTarget,
  errorMessage,
  logActionExecution,
  type Action,
  type ActionResult,
  type DeletePodAction,
  type IncreaseResourceLimitsAction,
  type RestartDeploymentAction,
  type ScaleDeploymentAction,
} from '@kubemend/shared';
import type { ClusterWriter, DeploymentPatch } from '@kubemend/kubernetes';
import type { SafetyGovernor } from './safety-governor.js';
import { SAFETY_DENIAL_MESSAGE, resourceKey } from './types.js';

const logger = createChildLogger({ component: 'RemediationExecutor' });

const RESTARTED_AT_ANNOTATION = 'kubectl.kubernetes.io/restartedAt';

export interface RemediationExecutorConfig {
  /** Describe actions instead of performing them; governor state still advances */
  dryRun: boolean;
  cluster: ClusterWriter;
  governor: SafetyGovernor;
}

interface ActionPlan {
  /** Message returned in dry-run mode */
  dryRunMessage: string;
  /** Performs the mutation and returns the success message */
  apply: () => Promise<string>;
}

export class RemediationExecutor {
  private config: RemediationExecutorConfig;

  constructor(config: RemediationExecutorConfig) {
    this.config = config;
  }

  get dryRun(): boolean {
    return this.config.dryRun;
  }

  async execute(action: Action): Promise<ActionResult> {
    switch (action.kind) {
      case ACTION_KINDS.SCALE_DEPLOYMENT:
        return this.scaleDeployment(action.deployment, action.namespace, action.replicas);
      case ACTION_KINDS.INCREASE_RESOURCE_LIMITS:
        return this.increaseResourceLimits(action.deployment, action.namespace, action.memoryLimit, action.cpuLimit);
      case ACTION_KINDS.RESTART_DEPLOYMENT:
        return this.restartDeployment(action.deployment, action.namespace);
      case ACTION_KINDS.DELETE_POD:
        return this.deletePod(action.pod, action.namespace);
    }
  }

  async scaleDeployment(deployment: string, namespace: string, replicas: number): Promise<ActionResult> {
    const action: ScaleDeploymentAction = { kind: ACTION_KINDS.SCALE_DEPLOYMENT, deployment, namespace, replicas };

    return this.perform(action, {
      dryRunMessage: `[DRY RUN] Would scale ${namespace}/${deployment} to ${replicas} replicas`,
      apply: async () => {
        await this.config.cluster.scaleDeployment(deployment, namespace, replicas);
        return `Scaled ${namespace}/${deployment} to ${replicas} replicas`;
      },
    });
  }

  /**
   * Limits and requests are set to the same values so requests never exceed limits
   */
  async increaseResourceLimits(
    deployment: string,
    namespace: string,
    memoryLimit: string,
    cpuLimit: string
  ): Promise<ActionResult> {
    const action: IncreaseResourceLimitsAction = {
      kind: ACTION_KINDS.INCREASE_RESOURCE_LIMITS,
      deployment,
      namespace,
      memoryLimit,
      cpuLimit,
    };

    return this.perform(action, {
      dryRunMessage: `[DRY RUN] Would increase limits for ${namespace}/${deployment} to memory=${memoryLimit}, cpu=${cpuLimit}`,
      apply: async () => {
        const containers = await this.config.cluster.getDeploymentContainerNames(deployment, namespace);
        const patch: DeploymentPatch = {
          spec: {
            template: {
              spec: {
                containers: containers.map((name) => ({
                  name,
                  resources: {
                    limits: { memory: memoryLimit, cpu: cpuLimit },
                    requests: { memory: memoryLimit, cpu: cpuLimit },
                  },
                })),
              },
            },
          },
        };
        await this.config.cluster.patchDeployment(deployment, namespace, patch);
        return `Increased resource limits for ${namespace}/${deployment}`;
      },
    });
  }

  async restartDeployment(deployment: string, namespace: string): Promise<ActionResult> {
    const action: RestartDeploymentAction = { kind: ACTION_KINDS.RESTART_DEPLOYMENT, deployment, namespace };

    return this.perform(action, {
      dryRunMessage: `[DRY RUN] Would restart deployment ${namespace}/${deployment}`,
      apply: async () => {
        await this.config.cluster.patchDeployment(deployment, namespace, {
          spec: {
            template: {
              metadata: { annotations: { [RESTARTED_AT_ANNOTATION]: new Date().toISOString() } },
            },
          },
        });
        return `Restarted deployment ${namespace}/${deployment}`;
      },
    });
  }

  async deletePod(pod: string, namespace: string): Promise<ActionResult> {
    const action: DeletePodAction = { kind: ACTION_KINDS.DELETE_POD, pod, namespace };

    return this.perform(action, {
      dryRunMessage: `[DRY RUN] Would delete pod ${namespace}/${pod}`,
      apply: async () => {
        await this.config.cluster.deletePod(pod, namespace);
        return `Deleted pod ${namespace}/${pod} (recreated by its controller)`;
      },
    });
  }

  private async perform(action: Action, plan: ActionPlan): Promise<ActionResult> {
    const target = actionTarget(action);
    const { dryRun } = this.config;
    const base = { kind: action.kind, target, dryRun };

    const decision = this.config.governor.tryApprove(resourceKey(action));
    if (!decision.approved) {
      logger.info(
        { action: action.kind, target: describeTarget(target), reason: decision.reason, retryAfterMs: decision.retryAfterMs },
        'Action denied by safety governor'
      );
      return { ...base, success: false, error: SAFETY_DENIAL_MESSAGE };
    }

    logActionExecution(action.kind, describeTarget(target), dryRun);

    if (dryRun) {
      logger.info({ action: action.kind, target: describeTarget(target) }, plan.dryRunMessage);
      return { ...base, success: true, message: plan.dryRunMessage };
    }

    try {
      const message = await plan.apply();
      logger.info({ action: action.kind, target: describeTarget(target) }, message);
      return { ...base, success: true, message };
    } catch (error) {
      const reason = error instanceof KubernetesApiError ? error.reason : errorMessage(error);
      logger.error({ action: action.kind, target: describeTarget(target), error: reason }, 'Action failed');
      return { ...base, success: false, error: reason };
    }
  }
}
