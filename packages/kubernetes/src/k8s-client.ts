/**
 * Kubernetes Client
 * Pod status snapshots, ownership lookups and the handful of mutations
 * the remediation executor is allowed to make
 */

import * as k8s from '@kubernetes/client-node';
import { createChildLogger, KubernetesApiError, TransportError, errorMessage } from '@kubemend/shared';
import type {
  ClusterGateway,
  ContainerSnapshot,
  DeploymentPatch,
  K8sClientConfig,
  OwnerKind,
  OwnerReference,
  PodSnapshot,
} from './types.js';

const PATCH_OPTIONS = {
  headers: { 'Content-Type': 'application/strategic-merge-patch+json' },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Translate a client-node failure into the project's error hierarchy.
 * HTTP errors carry the reason from the API server's Status body.
 */
export function toKubernetesError(error: unknown, context: Record<string, unknown> = {}): Error {
  if (error instanceof KubernetesApiError || error instanceof TransportError) {
    return error;
  }

  if (error instanceof k8s.HttpError) {
    const body: unknown = error.body;
    const statusReason = isRecord(body) && typeof body.reason === 'string' ? body.reason : undefined;
    const statusMessage = isRecord(body) && typeof body.message === 'string' ? body.message : undefined;
    const reason =
      statusReason ?? error.response?.statusMessage ?? `HTTP ${error.statusCode ?? 'error'}`;

    return new KubernetesApiError(reason, statusMessage ?? reason, error.statusCode, context);
  }

  return new TransportError(errorMessage(error), context);
}

function describeContainerState(state: k8s.V1ContainerState | undefined): string {
  if (state?.running) {
    return 'running';
  }
  if (state?.waiting) {
    return `waiting: ${state.waiting.reason ?? 'Unknown'}`;
  }
  if (state?.terminated) {
    return `terminated: ${state.terminated.reason ?? 'Unknown'}`;
  }
  return 'unknown';
}

export function toPodSnapshot(pod: k8s.V1Pod, namespace: string): PodSnapshot {
  const containers: ContainerSnapshot[] = (pod.status?.containerStatuses ?? []).map((cs) => ({
    name: cs.name,
    restartCount: cs.restartCount,
    lastTerminationReason: cs.lastState?.terminated?.reason,
    waitingReason: cs.state?.waiting?.reason,
    state: describeContainerState(cs.state),
  }));

  return {
    name: pod.metadata?.name ?? '',
    namespace: pod.metadata?.namespace ?? namespace,
    phase: pod.status?.phase ?? 'Unknown',
    reason: pod.status?.reason,
    containers,
  };
}

export class K8sClient implements ClusterGateway {
  private kc: k8s.KubeConfig;
  private appsApi: k8s.AppsV1Api;
  private coreApi: k8s.CoreV1Api;
  private logger = createChildLogger({ component: 'K8sClient' });

  constructor(config: K8sClientConfig = {}) {
    this.kc = new k8s.KubeConfig();

    if (config.kubeconfig) {
      this.kc.loadFromFile(config.kubeconfig);
    } else {
      // Covers in-cluster service accounts as well as ~/.kube/config
      this.kc.loadFromDefault();
    }

    if (config.context) {
      this.kc.setCurrentContext(config.context);
    }

    this.appsApi = this.kc.makeApiClient(k8s.AppsV1Api);
    this.coreApi = this.kc.makeApiClient(k8s.CoreV1Api);

    this.logger.info({ context: this.kc.getCurrentContext() }, 'K8s client initialized');
  }

  /**
   * Status snapshots of every pod in a namespace
   */
  async listPodSnapshots(namespace: string): Promise<PodSnapshot[]> {
    try {
      const response = await this.coreApi.listNamespacedPod(namespace);
      return response.body.items.map((pod) => toPodSnapshot(pod, namespace));
    } catch (error) {
      throw toKubernetesError(error, { namespace, operation: 'listNamespacedPod' });
    }
  }

  /**
   * Last `tailLines` lines of a pod's log (first container)
   */
  async getPodLogs(pod: string, namespace: string, tailLines: number): Promise<string> {
    try {
      const response = await this.coreApi.readNamespacedPodLog(
        pod,
        namespace,
        undefined, // container
        false, // follow
        undefined, // insecureSkipTLSVerifyBackend
        undefined, // limitBytes
        undefined, // pretty
        false, // previous
        undefined, // sinceSeconds
        tailLines
      );
      return response.body ?? '';
    } catch (error) {
      throw toKubernetesError(error, { namespace, pod, operation: 'readNamespacedPodLog' });
    }
  }

  /**
   * Owner references of a pod or a replica set
   */
  async getOwnerReferences(kind: OwnerKind, name: string, namespace: string): Promise<OwnerReference[]> {
    try {
      const response =
        kind === 'Pod'
          ? await this.coreApi.readNamespacedPod(name, namespace)
          : await this.appsApi.readNamespacedReplicaSet(name, namespace);

      return (response.body.metadata?.ownerReferences ?? []).map((owner) => ({
        kind: owner.kind,
        name: owner.name,
      }));
    } catch (error) {
      throw toKubernetesError(error, { namespace, name, kind, operation: 'getOwnerReferences' });
    }
  }

  /**
   * Names of the containers in a deployment's pod template
   */
  async getDeploymentContainerNames(deployment: string, namespace: string): Promise<string[]> {
    try {
      const response = await this.appsApi.readNamespacedDeployment(deployment, namespace);
      return (response.body.spec?.template.spec?.containers ?? []).map((container) => container.name);
    } catch (error) {
      throw toKubernetesError(error, { namespace, deployment, operation: 'readNamespacedDeployment' });
    }
  }

  async patchDeployment(deployment: string, namespace: string, patch: DeploymentPatch): Promise<void> {
    try {
      await this.appsApi.patchNamespacedDeployment(
        deployment,
        namespace,
        patch,
        undefined,
        undefined,
        undefined,
        undefined,
        undefined,
        PATCH_OPTIONS
      );
    } catch (error) {
      throw toKubernetesError(error, { namespace, deployment, operation: 'patchNamespacedDeployment' });
    }
  }

  async scaleDeployment(deployment: string, namespace: string, replicas: number): Promise<void> {
    try {
      await this.appsApi.patchNamespacedDeploymentScale(
        deployment,
        namespace,
        { spec: { replicas } },
        undefined,
        undefined,
        undefined,
        undefined,
        undefined,
        PATCH_OPTIONS
      );
    } catch (error) {
      throw toKubernetesError(error, { namespace, deployment, operation: 'patchNamespacedDeploymentScale' });
    }
  }

  async deletePod(pod: string, namespace: string): Promise<void> {
    try {
      await this.coreApi.deleteNamespacedPod(pod, namespace);
    } catch (error) {
      throw toKubernetesError(error, { namespace, pod, operation: 'deleteNamespacedPod' });
    }
  }
}
