/**
 * In-memory cluster used in place of the Kubernetes API
 */
import { KubernetesApiError } from '@kubemend/shared';
import type {
  ClusterGateway,
  DeploymentPatch,
  OwnerKind,
  OwnerReference,
  PodSnapshot,
} from '@kubemend/kubernetes';

export type ClusterMutation =
  | { op: 'patch'; namespace: string; deployment: string; patch: DeploymentPatch }
  | { op: 'scale'; namespace: string; deployment: string; replicas: number }
  | { op: 'delete'; namespace: string; pod: string };

export class FakeCluster implements ClusterGateway {
  readonly mutations: ClusterMutation[] = [];
  private pods = new Map<string, PodSnapshot[]>();
  private logs = new Map<string, string>();
  private owners = new Map<string, OwnerReference[]>();
  private containers = new Map<string, string[]>();

  setPods(namespace: string, pods: PodSnapshot[]): this {
    this.pods.set(namespace, pods);
    return this;
  }

  setLogs(namespace: string, pod: string, logs: string): this {
    this.logs.set(`${namespace}/${pod}`, logs);
    return this;
  }

  setOwners(kind: OwnerKind, namespace: string, name: string, owners: OwnerReference[]): this {
    this.owners.set(`${kind}:${namespace}/${name}`, owners);
    return this;
  }

  setDeployment(namespace: string, deployment: string, containers: string[]): this {
    this.containers.set(`${namespace}/${deployment}`, containers);
    return this;
  }

  async listPodSnapshots(namespace: string): Promise<PodSnapshot[]> {
    return this.pods.get(namespace) ?? [];
  }

  async getPodLogs(pod: string, namespace: string, tailLines: number): Promise<string> {
    const logs = this.logs.get(`${namespace}/${pod}`);
    if (logs === undefined) {
      throw new KubernetesApiError('NotFound', `pods "${pod}" not found`, 404);
    }
    return logs.split('\n').slice(-tailLines).join('\n');
  }

  async getOwnerReferences(kind: OwnerKind, name: string, namespace: string): Promise<OwnerReference[]> {
    return this.owners.get(`${kind}:${namespace}/${name}`) ?? [];
  }

  async getDeploymentContainerNames(deployment: string, namespace: string): Promise<string[]> {
    const containers = this.containers.get(`${namespace}/${deployment}`);
    if (containers === undefined) {
      throw new KubernetesApiError('NotFound', `deployments.apps "${deployment}" not found`, 404);
    }
    return containers;
  }

  async patchDeployment(deployment: string, namespace: string, patch: DeploymentPatch): Promise<void> {
    this.mutations.push({ op: 'patch', namespace, deployment, patch });
  }

  async scaleDeployment(deployment: string, namespace: string, replicas: number): Promise<void> {
    this.mutations.push({ op: 'scale', namespace, deployment, replicas });
  }

  async deletePod(pod: string, namespace: string): Promise<void> {
    this.mutations.push({ op: 'delete', namespace, pod });
  }
}
