/**
 * Kubernetes client types
 */

export interface K8sClientConfig {
  /** Kubernetes context to use (default: current context) */
  context?: string;
  /** Kubeconfig path (default: in-cluster or ~/.kube/config) */
  kubeconfig?: string;
}

/**
 * Point-in-time status of a single container
 */
export interface ContainerSnapshot {
  name: string;
  restartCount: number;
  /** Reason of the previous termination, e.g. `OOMKilled` */
  lastTerminationReason?: string;
  /** Reason the container is currently waiting, e.g. `CrashLoopBackOff` */
  waitingReason?: string;
  /** Short description of the current state, e.g. `waiting: CrashLoopBackOff` */
  state: string;
}

/**
 * Point-in-time status of a pod, as read from the API server
 */
export interface PodSnapshot {
  name: string;
  namespace: string;
  phase: string;
  reason?: string;
  containers: ContainerSnapshot[];
}

export interface OwnerReference {
  kind: string;
  name: string;
}

export type OwnerKind = 'Pod' | 'ReplicaSet';

/**
 * Strategic merge patch for a deployment's pod template
 */
export interface DeploymentPatch {
  spec: {
    template: {
      metadata?: {
        annotations: Record<string, string>;
      };
      spec?: {
        containers: Array<{
          name: string;
          resources: {
            limits: Record<string, string>;
            requests: Record<string, string>;
          };
        }>;
      };
    };
  };
}

/**
 * Read-only cluster queries used by the observer and the dispatcher
 */
export interface ClusterReader {
  listPodSnapshots(namespace: string): Promise<PodSnapshot[]>;
  getPodLogs(pod: string, namespace: string, tailLines: number): Promise<string>;
  getOwnerReferences(kind: OwnerKind, name: string, namespace: string): Promise<OwnerReference[]>;
}

/**
 * Mutations used by the remediation executor
 */
export interface ClusterWriter {
  getDeploymentContainerNames(deployment: string, namespace: string): Promise<string[]>;
  patchDeployment(deployment: string, namespace: string, patch: DeploymentPatch): Promise<void>;
  scaleDeployment(deployment: string, namespace: string, replicas: number): Promise<void>;
  deletePod(pod: string, namespace: string): Promise<void>;
}

export type ClusterGateway = ClusterReader & ClusterWriter;
