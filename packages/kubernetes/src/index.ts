/**
 * @kubemend/kubernetes
 * Kubernetes client: pod snapshots, ownership lookups and remediation mutations
 */

export { K8sClient, toKubernetesError, toPodSnapshot } from './k8s-client.js';
export * from './types.js';
