/**
 * Cluster State Observer
 * Read-only view of pod health. Cluster failures never escape: a namespace
 * that cannot be listed yields no snapshots and a log that cannot be read
 * yields an error string.
 */

import {
  KubernetesApiError,
  KubemendError,
  createChildLogger,
  errorMessage,
  isRetryableError,
} from '@kubemend/shared';
import type { ClusterReader, PodSnapshot } from '@kubemend/kubernetes';

const logger = createChildLogger({ component: 'ClusterStateObserver' });

export class ClusterStateObserver {
  private cluster: ClusterReader;

  constructor(cluster: ClusterReader) {
    this.cluster = cluster;
  }

  async getPodSnapshots(namespace: string): Promise<PodSnapshot[]> {
    try {
      const snapshots = await this.cluster.listPodSnapshots(namespace);
      logger.debug({ namespace, pods: snapshots.length }, 'Pod snapshots collected');
      return snapshots;
    } catch (error) {
      logger.error(
        {
          namespace,
          code: error instanceof KubemendError ? error.code : undefined,
          retryable: isRetryableError(error),
          error: errorMessage(error),
        },
        'Failed to list pods, skipping namespace'
      );
      return [];
    }
  }

  async getPodLogs(pod: string, namespace: string, tailLines: number): Promise<string> {
    try {
      return await this.cluster.getPodLogs(pod, namespace, tailLines);
    } catch (error) {
      const message =
        error instanceof KubernetesApiError
          ? `K8s API error fetching logs for ${pod}: ${error.reason}`
          : `Error fetching logs for ${pod}: ${errorMessage(error)}`;
      logger.warn({ pod, namespace }, message);
      return message;
    }
  }
}
