/**
 * Status Store
 * Single-writer record of what the control loop has done. Readers only ever
 * receive detached snapshots.
 */

import {
  issueContainer,
  type ActionResult,
  type AgentStatus,
  type GovernorStats,
  type Incident,
  type Issue,
  type RecentAction,
  type RecentIncident,
  type RecentIssue,
  type StatusSnapshot,
} from '@kubemend/shared';

export const STATUS_LIMITS = {
  recentIssues: 50,
  recentActions: 50,
  incidents: 20,
  reportChars: 2000,
} as const;

export interface StatusStoreConfig {
  dryRun: boolean;
  namespaces: string[];
  now?: () => Date;
}

function pushBounded<T>(items: T[], item: T, limit: number): void {
  items.push(item);
  if (items.length > limit) {
    items.splice(0, items.length - limit);
  }
}

function toRecentIssue(issue: Issue): RecentIssue {
  const container = issueContainer(issue);
  return {
    type: issue.type,
    severity: issue.severity,
    pod: issue.pod,
    namespace: issue.namespace,
    ...(container !== undefined ? { container } : {}),
    detectedAt: issue.detectedAt.toISOString(),
  };
}

export class StatusStore {
  private state: StatusSnapshot;
  private now: () => Date;

  constructor(config: StatusStoreConfig) {
    this.now = config.now ?? (() => new Date());
    this.state = {
      status: 'initializing',
      startedAt: null,
      lastCheck: null,
      checksTotal: 0,
      issuesDetected: 0,
      actionsTaken: 0,
      dryRun: config.dryRun,
      namespaces: [...config.namespaces],
      recentIssues: [],
      recentActions: [],
      incidents: [],
      governor: null,
    };
  }

  setStatus(status: AgentStatus): void {
    this.state.status = status;
  }

  markStarted(): void {
    this.state.status = 'running';
    this.state.startedAt = this.now().toISOString();
  }

  /**
   * One completed observation pass and the issues it found
   */
  recordCheck(issues: readonly Issue[]): void {
    this.state.lastCheck = this.now().toISOString();
    this.state.checksTotal += 1;
    this.state.issuesDetected += issues.length;

    for (const issue of issues) {
      pushBounded(this.state.recentIssues, toRecentIssue(issue), STATUS_LIMITS.recentIssues);
    }
  }

  recordAction(issue: Issue, result: ActionResult): void {
    const action: RecentAction = {
      timestamp: this.now().toISOString(),
      issueType: issue.type,
      pod: issue.pod,
      namespace: issue.namespace,
      action: result.kind,
      success: result.success,
      dryRun: result.dryRun,
      message: result.success ? result.message : result.error,
    };

    this.state.actionsTaken += 1;
    pushBounded(this.state.recentActions, action, STATUS_LIMITS.recentActions);
  }

  recordIncident(incident: Pick<Incident, 'timestamp' | 'report'>): void {
    const entry: RecentIncident = {
      timestamp: incident.timestamp.toISOString(),
      report: incident.report.slice(0, STATUS_LIMITS.reportChars),
    };
    pushBounded(this.state.incidents, entry, STATUS_LIMITS.incidents);
  }

  setGovernorStats(stats: GovernorStats): void {
    this.state.governor = { ...stats };
  }

  /**
   * Deep copy of the current status
   */
  snapshot(): StatusSnapshot {
    return structuredClone(this.state);
  }

  /**
   * Deep copy of the retained incidents, oldest first
   */
  incidents(): RecentIncident[] {
    return structuredClone(this.state.incidents);
  }
}
