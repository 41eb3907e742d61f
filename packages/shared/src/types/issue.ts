/**
 * Issue types
 * A classified abnormal condition observed on a pod or container
 */

export const ISSUE_TYPES = {
  HIGH_RESTART_COUNT: 'HighRestartCount',
  OOM_KILLED: 'OomKilled',
  CRASH_LOOP_BACK_OFF: 'CrashLoopBackOff',
  POD_NOT_RUNNING: 'PodNotRunning',
} as const;

export type IssueType = (typeof ISSUE_TYPES)[keyof typeof ISSUE_TYPES];

export type IssueSeverity = 'warning' | 'critical';

interface IssueBase {
  pod: string;
  namespace: string;
  detectedAt: Date;
}

export interface HighRestartCountIssue extends IssueBase {
  readonly type: typeof ISSUE_TYPES.HIGH_RESTART_COUNT;
  readonly severity: 'warning';
  container: string;
  restartCount: number;
  /** Short description of the container's current state */
  state: string;
}

export interface OomKilledIssue extends IssueBase {
  readonly type: typeof ISSUE_TYPES.OOM_KILLED;
  readonly severity: 'critical';
  container: string;
}

export interface CrashLoopBackOffIssue extends IssueBase {
  readonly type: typeof ISSUE_TYPES.CRASH_LOOP_BACK_OFF;
  readonly severity: 'critical';
  container: string;
  restartCount: number;
}

export interface PodNotRunningIssue extends IssueBase {
  readonly type: typeof ISSUE_TYPES.POD_NOT_RUNNING;
  readonly severity: 'warning';
  phase: string;
  reason: string;
}

export type Issue = Readonly<
  HighRestartCountIssue | OomKilledIssue | CrashLoopBackOffIssue | PodNotRunningIssue
>;

/**
 * Container the issue refers to, when it is container-scoped
 */
export function issueContainer(issue: Issue): string | undefined {
  return issue.type === ISSUE_TYPES.POD_NOT_RUNNING ? undefined : issue.container;
}
