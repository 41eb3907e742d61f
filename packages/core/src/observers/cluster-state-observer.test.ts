/**
 * Cluster State Observer Tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { KubernetesApiError, TransportError } from '@kubemend/shared';
import type { ClusterReader, PodSnapshot } from '@kubemend/kubernetes';
import { ClusterStateObserver } from './cluster-state-observer.js';

describe('ClusterStateObserver', () => {
  const listPodSnapshots = vi.fn<[string], Promise<PodSnapshot[]>>();
  const getPodLogs = vi.fn<[string, string, number], Promise<string>>();
  const cluster: ClusterReader = { listPodSnapshots, getPodLogs, getOwnerReferences: vi.fn() };
  let observer: ClusterStateObserver;

  beforeEach(() => {
    listPodSnapshots.mockReset();
    getPodLogs.mockReset();
    observer = new ClusterStateObserver(cluster);
  });

  describe('getPodSnapshots', () => {
    it('should return the snapshots of a namespace', async () => {
      const snapshots: PodSnapshot[] = [{ name: 'web-1', namespace: 'prod', phase: 'Running', containers: [] }];
      listPodSnapshots.mockResolvedValue(snapshots);

      await expect(observer.getPodSnapshots('prod')).resolves.toEqual(snapshots);
    });

    it('should yield no snapshots when the API server is unreachable', async () => {
      listPodSnapshots.mockRejectedValue(new TransportError('connect ECONNREFUSED 127.0.0.1:6443'));

      await expect(observer.getPodSnapshots('prod')).resolves.toEqual([]);
    });

    it('should yield no snapshots on an API error', async () => {
      listPodSnapshots.mockRejectedValue(new KubernetesApiError('Forbidden', 'pods is forbidden', 403));

      await expect(observer.getPodSnapshots('restricted')).resolves.toEqual([]);
    });
  });

  describe('getPodLogs', () => {
    it('should return the log text', async () => {
      getPodLogs.mockResolvedValue('started\nlistening on :8080');

      await expect(observer.getPodLogs('web-1', 'prod', 50)).resolves.toBe('started\nlistening on :8080');
      expect(getPodLogs).toHaveBeenCalledWith('web-1', 'prod', 50);
    });

    it('should describe an API error instead of throwing', async () => {
      getPodLogs.mockRejectedValue(new KubernetesApiError('BadRequest', 'container is waiting to start', 400));

      await expect(observer.getPodLogs('web-1', 'prod', 50)).resolves.toBe(
        'K8s API error fetching logs for web-1: BadRequest'
      );
    });

    it('should describe any other failure instead of throwing', async () => {
      getPodLogs.mockRejectedValue(new TransportError('socket hang up'));

      await expect(observer.getPodLogs('web-1', 'prod', 50)).resolves.toBe('Error fetching logs for web-1: socket hang up');
    });
  });
});
