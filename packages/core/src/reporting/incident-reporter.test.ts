/**
 * Incident Reporter Tests
 */
import { describe, it, expect } from 'vitest';
import { ACTION_KINDS, ISSUE_TYPES, type ActionResult, type Analysis, type Issue } from '@kubemend/shared';
import { IncidentReporter, renderIncidentReport } from './incident-reporter.js';

const generatedAt = new Date('2024-05-01T12:00:30.000Z');

const restartIssue: Issue = {
  type: ISSUE_TYPES.HIGH_RESTART_COUNT,
  severity: 'warning',
  pod: 'web-7c9f8d-x2z1',
  namespace: 'prod',
  container: 'app',
  restartCount: 5,
  state: 'running',
  detectedAt: new Date('2024-05-01T12:00:00.000Z'),
};

const pendingIssue: Issue = {
  type: ISSUE_TYPES.POD_NOT_RUNNING,
  severity: 'warning',
  pod: 'worker-5d4f-abcde',
  namespace: 'jobs',
  phase: 'Pending',
  reason: 'Unknown',
  detectedAt: new Date('2024-05-01T12:00:00.000Z'),
};

const analysis: Analysis = {
  rootCause: 'Detected HighRestartCount issue',
  recommendedAction: 'apply_default_healing',
  riskLevel: 'medium',
  explanation: '',
  source: 'fallback',
};

const deleted: ActionResult = {
  kind: ACTION_KINDS.DELETE_POD,
  target: { namespace: 'prod', pod: 'web-7c9f8d-x2z1' },
  dryRun: false,
  success: true,
  message: 'Deleted pod prod/web-7c9f8d-x2z1 (recreated by its controller)',
};

describe('renderIncidentReport', () => {
  it('should render the full report layout', () => {
    expect(renderIncidentReport(restartIssue, analysis, deleted, generatedAt)).toBe(
      [
        '# Incident Report',
        '**Generated:** 2024-05-01T12:00:30.000Z',
        '**Agent Version:** 1.0.0',
        '',
        '## Issue Detected',
        '- **Type:** HighRestartCount',
        '- **Severity:** warning',
        '- **Resource:** web-7c9f8d-x2z1',
        '- **Namespace:** prod',
        '- **Container:** app',
        '- **Detected At:** 2024-05-01T12:00:00.000Z',
        '',
        '## AI Analysis',
        '- **Root Cause:** Detected HighRestartCount issue',
        '- **Risk Level:** medium',
        '- **Explanation:** N/A',
        '',
        '## Action Taken',
        '```json',
        '{',
        '  "kind": "DeletePod",',
        '  "target": {',
        '    "namespace": "prod",',
        '    "pod": "web-7c9f8d-x2z1"',
        '  },',
        '  "dryRun": false,',
        '  "success": true,',
        '  "message": "Deleted pod prod/web-7c9f8d-x2z1 (recreated by its controller)"',
        '}',
        '```',
        '',
        '## Resolution Status',
        '**Result:** Successful',
        '**Dry Run:** No',
        '',
      ].join('\n')
    );
  });

  it('should show N/A for a pod-level issue and report a failed dry run', () => {
    const failed: ActionResult = {
      kind: ACTION_KINDS.RESTART_DEPLOYMENT,
      target: { namespace: 'jobs', deployment: 'worker' },
      dryRun: true,
      success: false,
      error: 'Rate limited or in cooldown',
    };

    const report = renderIncidentReport(pendingIssue, analysis, failed, generatedAt);

    expect(report).toContain('- **Container:** N/A\n');
    expect(report).toContain('**Result:** Failed\n**Dry Run:** Yes\n');
  });
});

describe('IncidentReporter', () => {
  it('should return the report and record the incident', () => {
    const reporter = new IncidentReporter({ maxIncidents: 10, now: () => generatedAt });

    const report = reporter.report(restartIssue, analysis, deleted);

    expect(report).toContain('Deleted pod prod/web-7c9f8d-x2z1');
    expect(reporter.getIncidents()).toEqual([
      { timestamp: generatedAt, issue: restartIssue, analysis, result: deleted, report },
    ]);
  });

  it('should evict the oldest incidents beyond the retention limit', () => {
    let tick = 0;
    const reporter = new IncidentReporter({
      maxIncidents: 2,
      now: () => new Date(Date.UTC(2024, 4, 1, 12, 0, tick++)),
    });

    reporter.report(restartIssue, analysis, deleted);
    reporter.report(pendingIssue, analysis, deleted);
    reporter.report(restartIssue, analysis, deleted);

    const incidents = reporter.getIncidents();
    expect(incidents).toHaveLength(2);
    expect(incidents.map((incident) => incident.timestamp.toISOString())).toEqual([
      '2024-05-01T12:00:01.000Z',
      '2024-05-01T12:00:02.000Z',
    ]);
    expect(incidents[0]?.issue.pod).toBe('worker-5d4f-abcde');
  });
});
