/**
 * Kubemend Agent
 * Runs the remediation control loop and, when enabled, the status server
 */

import type { FastifyInstance } from 'fastify';
import {
  AGENT_VERSION,
  ConfigurationError,
  createChildLogger,
  getConfig,
  validateConfig,
  wrapError,
} from '@kubemend/shared';
import { K8sClient } from '@kubemend/kubernetes';
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
import { startStatusServer } from './server.js';

const logger = createChildLogger({ component: 'Agent' });

async function main(): Promise<void> {
  const validation = validateConfig();
  if (!validation.valid) {
    throw new ConfigurationError('Invalid configuration', { errors: validation.errors });
  }
  const config = getConfig();

  const cluster = new K8sClient({
    kubeconfig: config.kubernetes.kubeconfig,
    context: config.kubernetes.context,
  });

  const capability = resolveOracleCapability(config.oracle);
  const governor = new SafetyGovernor(config.safety);
  const status = new StatusStore({ dryRun: config.agent.dryRun, namespaces: config.agent.namespaces });

  const loop = new ControlLoop(
    {
      observer: new ClusterStateObserver(cluster),
      oracle: new ReasoningOracleAdapter(capability, {
        timeoutMs: config.oracle.timeoutMs,
        logTailLines: config.agent.logTailLines,
      }),
      dispatcher: new ActionDispatcher(cluster, {
        memoryLimit: config.healing.oomMemoryIncrease,
        cpuLimit: config.healing.oomCpuIncrease,
      }),
      executor: new RemediationExecutor({ dryRun: config.agent.dryRun, cluster, governor }),
      governor,
      reporter: new IncidentReporter({ maxIncidents: config.agent.maxIncidents }),
      writer: new ReportWriter(config.agent.reportDir),
      status,
    },
    {
      namespaces: config.agent.namespaces,
      excludedNamespaces: config.agent.excludedNamespaces,
      thresholds: { restartCountThreshold: config.detection.restartCountThreshold },
      logTailLines: config.agent.logTailLines,
      checkIntervalSeconds: config.agent.checkIntervalSeconds,
    }
  );

  logger.info(
    {
      version: AGENT_VERSION,
      dryRun: config.agent.dryRun,
      namespaces: loop.watchedNamespaces,
      oracle: capability.kind === 'present' ? config.oracle.model : `unavailable (${capability.reason})`,
    },
    config.agent.dryRun ? 'Agent starting in DRY RUN mode' : 'Agent starting'
  );

  const server: FastifyInstance | null = config.server.enabled
    ? await startStatusServer({
        status,
        corsOrigin: config.server.corsOrigin,
        port: config.server.port,
        host: config.server.host,
      })
    : null;

  // The current tick finishes; only the wait between ticks is interrupted
  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down...`);
    controller.abort();
  };
  // Handlers stay installed so a repeated signal never kills an in-flight mutation
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await loop.run(controller.signal);

  if (server) {
    await server.close();
  }
  logger.info('Agent stopped');
}

main().catch((error: unknown) => {
  const wrapped = wrapError(error);
  logger.fatal({ error: wrapped.toJSON() }, 'Agent failed to start');
  process.exit(1);
});
