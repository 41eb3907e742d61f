/**
 * Control Loop
 * Observe → classify → analyse → dispatch → execute → report, once per tick,
 * repeated until the run signal fires.
 */

import { EventEmitter } from 'eventemitter3';
import {
  createChildLogger,
  describeTarget,
  isRetryableError,
  wrapError,
  type ActionResult,
  type Incident,
  type Issue,
  type KubemendError,
} from '@kubemend/shared';
import type { ClusterStateObserver } from '../observers/cluster-state-observer.js';
import { classifyPods, type ClassifierThresholds } from '../detection/issue-classifier.js';
import type { ReasoningOracleAdapter } from '../reasoning/oracle-adapter.js';
import type { ActionDispatcher } from '../agents/executor/action-dispatcher.js';
import type { RemediationExecutor } from '../agents/executor/remediation-executor.js';
import type { SafetyGovernor } from '../agents/executor/safety-governor.js';
import type { IncidentReporter } from '../reporting/incident-reporter.js';
import type { ReportWriter } from '../reporting/report-writer.js';
import type { StatusStore } from '../status/status-store.js';

export interface ControlLoopDependencies {
  observer: ClusterStateObserver;
  oracle: ReasoningOracleAdapter;
  dispatcher: ActionDispatcher;
  executor: RemediationExecutor;
  governor: SafetyGovernor;
  reporter: IncidentReporter;
  writer: ReportWriter;
  status: StatusStore;
}

export interface ControlLoopConfig {
  namespaces: string[];
  excludedNamespaces: string[];
  thresholds: ClassifierThresholds;
  logTailLines: number;
  checkIntervalSeconds: number;
}

export interface TickSummary {
  namespaces: string[];
  issues: number;
  actions: number;
  /** Reports rendered during the tick, in handling order */
  reports: string[];
}

export interface ControlLoopEvents {
  'tick:started': () => void;
  'issue:detected': (issue: Issue) => void;
  'action:executed': (issue: Issue, result: ActionResult) => void;
  'incident:reported': (incident: Incident, path: string | null) => void;
  'tick:completed': (summary: TickSummary) => void;
  'tick:failed': (error: KubemendError) => void;
}

/**
 * Resolves after `ms`, or as soon as the signal fires
 */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class ControlLoop extends EventEmitter<ControlLoopEvents> {
  private deps: ControlLoopDependencies;
  private config: ControlLoopConfig;
  private logger = createChildLogger({ component: 'ControlLoop' });

  constructor(deps: ControlLoopDependencies, config: ControlLoopConfig) {
    super();
    this.deps = deps;
    this.config = config;
  }

  /**
   * Configured namespaces minus the excluded ones
   */
  get watchedNamespaces(): string[] {
    const excluded = new Set(this.config.excludedNamespaces);
    return this.config.namespaces.filter((namespace) => !excluded.has(namespace));
  }

  /**
   * One full pass over the watched namespaces
   */
  async runTick(): Promise<TickSummary> {
    const { observer, status, governor } = this.deps;
    const namespaces = this.watchedNamespaces;
    const summary: TickSummary = { namespaces, issues: 0, actions: 0, reports: [] };

    this.emit('tick:started');

    const issues: Issue[] = [];
    for (const namespace of namespaces) {
      const snapshots = await observer.getPodSnapshots(namespace);
      issues.push(...classifyPods(snapshots, this.config.thresholds));
    }

    status.recordCheck(issues);
    summary.issues = issues.length;

    if (issues.length === 0) {
      this.logger.info({ namespaces }, 'No issues detected');
    } else {
      this.logger.info({ namespaces, issues: issues.length }, 'Issues detected');

      for (const issue of issues) {
        this.emit('issue:detected', issue);
        const report = await this.handleIssue(issue);
        if (report !== null) {
          summary.actions += 1;
          summary.reports.push(report);
        }
      }
    }

    status.setGovernorStats(governor.getStats());
    this.emit('tick:completed', summary);
    return summary;
  }

  /**
   * Repeat ticks until `signal` fires. The wait between ticks is cut short
   * by the signal; a tick already running is allowed to finish.
   */
  async run(signal: AbortSignal): Promise<void> {
    const { status } = this.deps;
    status.markStarted();
    this.logger.info(
      { namespaces: this.watchedNamespaces, intervalSeconds: this.config.checkIntervalSeconds },
      'Control loop started'
    );

    while (!signal.aborted) {
      try {
        await this.runTick();
        status.setStatus('running');
      } catch (error) {
        const wrapped = wrapError(error, { phase: 'tick' });
        this.logger.error(
          { error: wrapped.toJSON(), retryable: isRetryableError(wrapped) },
          'Control loop tick failed'
        );
        status.setStatus('error');
        this.emit('tick:failed', wrapped);
      }

      await sleep(this.config.checkIntervalSeconds * 1000, signal);
    }

    status.setStatus('stopped');
    this.logger.info('Control loop stopped');
  }

  /**
   * Returns the rendered report, or null when no action applies
   */
  private async handleIssue(issue: Issue): Promise<string | null> {
    const { observer, oracle, dispatcher, executor, reporter, writer, status } = this.deps;
    const log = this.logger.child({ pod: issue.pod, namespace: issue.namespace, issueType: issue.type });

    const logs = await observer.getPodLogs(issue.pod, issue.namespace, this.config.logTailLines);
    const analysis = await oracle.analyze(issue, logs);

    const action = await dispatcher.dispatch(issue);
    if (action === null) {
      log.info('No healing action mapped');
      return null;
    }

    const result = await executor.execute(action);
    status.recordAction(issue, result);
    this.emit('action:executed', issue, result);
    log.info(
      { action: action.kind, target: describeTarget(result.target), success: result.success, dryRun: result.dryRun },
      result.success ? result.message : `Action failed: ${result.error}`
    );

    const report = reporter.report(issue, analysis, result);
    const incident = reporter.getIncidents().at(-1);
    const generatedAt = incident?.timestamp ?? new Date();
    const path = await writer.write(report, generatedAt);

    status.recordIncident({ timestamp: generatedAt, report });
    if (incident !== undefined) {
      this.emit('incident:reported', incident, path);
    }

    return report;
  }
}
