/**
 * Remediation Cycle E2E Tests
 * Full control loop ticks against an in-memory cluster, with the Gemini API
 * served by MSW and reports written to a temporary directory
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { http, HttpResponse } from 'msw';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { server } from '../setup.js';
import { GEMINI_GENERATE_URL } from '../mocks/gemini-handlers.js';
import { FakeCluster } from '../mocks/fake-cluster.js';
import {
  ActionDispatcher,
  ClusterStateObserver,
  ControlLoop,
  IncidentReporter,
  ReasoningOracleAdapter,
  RemediationExecutor,
  ReportWriter,
  SafetyGovernor,
  StatusStore,
  resolveOracleCapability,
} from '@kubemend/core';
import type { Config } from '@kubemend/shared';

const oracleConfig: Config['oracle'] = {
  enabled: true,
  apiKey: 'test-api-key',
  vertexai: false,
  project: undefined,
  location: 'us-central1',
  model: 'gemini-2.0-flash-001',
  timeoutMs: 5000,
};

function buildAgent(cluster: FakeCluster, reportDir: string) {
  const governor = new SafetyGovernor({ maxActionsPerHour: 20, cooldownSeconds: 60 });
  const status = new StatusStore({ dryRun: false, namespaces: ['prod'] });
  const loop = new ControlLoop(
    {
      observer: new ClusterStateObserver(cluster),
      oracle: new ReasoningOracleAdapter(resolveOracleCapability(oracleConfig), {
        timeoutMs: oracleConfig.timeoutMs,
        logTailLines: 50,
      }),
      dispatcher: new ActionDispatcher(cluster, { memoryLimit: '256Mi', cpuLimit: '200m' }),
      executor: new RemediationExecutor({ dryRun: false, cluster, governor }),
      governor,
      reporter: new IncidentReporter({ maxIncidents: 100 }),
      writer: new ReportWriter(reportDir),
      status,
    },
    {
      namespaces: ['prod'],
      excludedNamespaces: ['kube-system'],
      thresholds: { restartCountThreshold: 3 },
      logTailLines: 50,
      checkIntervalSeconds: 30,
    }
  );
  return { loop, status };
}

describe('Remediation cycle', () => {
  let reportDir: string;
  let cluster: FakeCluster;

  beforeEach(async () => {
    reportDir = await mkdtemp(join(tmpdir(), 'kubemend-e2e-'));
    cluster = new FakeCluster()
      .setPods('prod', [
        {
          name: 'web-7c9f8d-x2z1',
          namespace: 'prod',
          phase: 'Running',
          containers: [{ name: 'web', restartCount: 5, state: 'running' }],
        },
      ])
      .setLogs('prod', 'web-7c9f8d-x2z1', 'GET /healthz 503\nshutting down after failed probe');
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));
  });

  afterEach(async () => {
    vi.useRealTimers();
    await rm(reportDir, { recursive: true, force: true });
  });

  it('should delete a restarting pod, then hold off while it is in cooldown', async () => {
    const { loop, status } = buildAgent(cluster, reportDir);

    const first = await loop.runTick();

    expect(first.actions).toBe(1);
    expect(first.reports[0]).toContain('Deleted pod prod/web-7c9f8d-x2z1');
    expect(first.reports[0]).toContain('- **Root Cause:** Application exits after failing its startup health probe');
    expect(first.reports[0]).toContain('- **Risk Level:** low');
    expect(cluster.mutations).toEqual([{ op: 'delete', namespace: 'prod', pod: 'web-7c9f8d-x2z1' }]);

    vi.setSystemTime(new Date('2024-05-01T12:00:10.000Z'));
    const second = await loop.runTick();

    expect(second.reports[0]).toContain('"error": "Rate limited or in cooldown"');
    expect(cluster.mutations).toHaveLength(1);

    const files = (await readdir(reportDir)).sort();
    expect(files).toEqual([
      'incident_report_20240501_120000_1.md',
      'incident_report_20240501_120010_2.md',
    ]);
    await expect(readFile(join(reportDir, files[0] ?? ''), 'utf-8')).resolves.toBe(first.reports[0]);

    const snapshot = status.snapshot();
    expect(snapshot.checksTotal).toBe(2);
    expect(snapshot.issuesDetected).toBe(2);
    expect(snapshot.actionsTaken).toBe(2);
    expect(snapshot.recentActions.map((action) => action.success)).toEqual([true, false]);
  });

  it('should still remediate when the Gemini API fails', async () => {
    server.use(
      http.post(GEMINI_GENERATE_URL, () => {
        return HttpResponse.json({ error: { code: 500, message: 'internal', status: 'INTERNAL' } }, { status: 500 });
      })
    );
    const { loop } = buildAgent(cluster, reportDir);

    const { reports } = await loop.runTick();

    expect(reports[0]).toContain('- **Root Cause:** Detected HighRestartCount issue');
    expect(reports[0]).toContain('Applying rule-based healing.');
    expect(reports[0]).toContain('**Result:** Successful');
    expect(cluster.mutations).toEqual([{ op: 'delete', namespace: 'prod', pod: 'web-7c9f8d-x2z1' }]);
  });
});
