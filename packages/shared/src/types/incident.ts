/**
 * Incident records and the read-only status snapshot
 */

import type { ActionResult } from './action.js';
import type { Analysis } from './analysis.js';
import type { Issue } from './issue.js';

export interface Incident {
  timestamp: Date;
  issue: Issue;
  analysis: Analysis;
  result: ActionResult;
  /** Rendered Markdown report */
  report: string;
}

export type AgentStatus = 'initializing' | 'running' | 'error' | 'stopped';

export interface RecentAction {
  timestamp: string;
  issueType: Issue['type'];
  pod: string;
  namespace: string;
  action: ActionResult['kind'];
  success: boolean;
  dryRun: boolean;
  message: string;
}

export interface RecentIncident {
  timestamp: string;
  report: string;
}

export interface RecentIssue {
  type: Issue['type'];
  severity: Issue['severity'];
  pod: string;
  namespace: string;
  container?: string;
  detectedAt: string;
}

export interface GovernorStats {
  actionsLastHour: number;
  maxActionsPerHour: number;
  cooldownSeconds: number;
  trackedResources: number;
}

export interface StatusSnapshot {
  status: AgentStatus;
  startedAt: string | null;
  lastCheck: string | null;
  checksTotal: number;
  issuesDetected: number;
  actionsTaken: number;
  dryRun: boolean;
  namespaces: string[];
  recentIssues: RecentIssue[];
  recentActions: RecentAction[];
  incidents: RecentIncident[];
  governor: GovernorStats | null;
}
