/**
 * Issue Classifier
 * Pure mapping from pod snapshots to typed issues
 */

import { ISSUE_TYPES, type Issue } from '@kubemend/shared';
import type { PodSnapshot } from '@kubemend/kubernetes';

export interface ClassifierThresholds {
  /** A container restarted more often than this is reported */
  restartCountThreshold: number;
}

const HEALTHY_PHASES: ReadonlySet<string> = new Set(['Running', 'Succeeded']);

/**
 * Classify pod snapshots into issues.
 *
 * Output order is per pod, per container (restart count, OOM, crash loop),
 * then the pod phase rule. Identical input and `now` give identical output.
 */
export function classifyPods(
  snapshots: readonly PodSnapshot[],
  thresholds: ClassifierThresholds,
  now: Date = new Date()
): Issue[] {
  const issues: Issue[] = [];

  for (const pod of snapshots) {
    const base = { pod: pod.name, namespace: pod.namespace, detectedAt: new Date(now.getTime()) };

    for (const container of pod.containers) {
      if (container.restartCount > thresholds.restartCountThreshold) {
        issues.push({
          ...base,
          type: ISSUE_TYPES.HIGH_RESTART_COUNT,
          severity: 'warning',
          container: container.name,
          restartCount: container.restartCount,
          state: container.state,
        });
      }

      if (container.lastTerminationReason === 'OOMKilled') {
        issues.push({
          ...base,
          type: ISSUE_TYPES.OOM_KILLED,
          severity: 'critical',
          container: container.name,
        });
      }

      if (container.waitingReason === 'CrashLoopBackOff') {
        issues.push({
          ...base,
          type: ISSUE_TYPES.CRASH_LOOP_BACK_OFF,
          severity: 'critical',
          container: container.name,
          restartCount: container.restartCount,
        });
      }
    }

    if (!HEALTHY_PHASES.has(pod.phase)) {
      issues.push({
        ...base,
        type: ISSUE_TYPES.POD_NOT_RUNNING,
        severity: 'warning',
        phase: pod.phase,
        reason: pod.reason || 'Unknown',
      });
    }
  }

  return issues;
}
