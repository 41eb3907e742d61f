/**
 * Configuration management for Kubemend
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_NODE_ENV, LOG_LEVELS, NODE_ENVS } from '../logger/index.js';

// Load environment variables - the agent may be started from the repo root
// or from inside apps/agent, so check both before the computed monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(process.cwd(), '../../.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  // dotenv never overrides variables that are already set
  dotenvConfig({ path: envPath });
}

const TRUTHY = ['true', '1', 'yes'];

/**
 * Boolean flag read from the environment: true|1|yes (any case) is true,
 * any other value is false, unset falls back to the default
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? defaultValue : TRUTHY.includes(value.trim().toLowerCase())));

/**
 * Comma separated list, trimmed, empty entries dropped
 */
const envList = (defaultValue: string) =>
  z
    .string()
    .default(defaultValue)
    .transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter(Boolean)
    );

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(NODE_ENVS).default(DEFAULT_NODE_ENV),
  logLevel: z.enum(LOG_LEVELS).default('info'),

  // Control loop
  agent: z.object({
    checkIntervalSeconds: z.coerce.number().int().positive().default(30),
    dryRun: envBoolean(false),
    namespaces: envList('default'),
    excludedNamespaces: envList('kube-system,kube-public,istio-system'),
    reportDir: z.string().default('./reports'),
    logTailLines: z.coerce.number().int().positive().default(50),
    maxIncidents: z.coerce.number().int().positive().default(100),
  }),

  // Issue classification thresholds
  detection: z.object({
    restartCountThreshold: z.coerce.number().int().nonnegative().default(3),
  }),

  // Resource deltas applied by healing actions
  healing: z.object({
    oomMemoryIncrease: z.string().default('256Mi'),
    oomCpuIncrease: z.string().default('200m'),
  }),

  // Safety governor
  safety: z.object({
    maxActionsPerHour: z.coerce.number().int().positive().default(20),
    cooldownSeconds: z.coerce.number().nonnegative().default(60),
  }),

  // Kubernetes
  kubernetes: z.object({
    kubeconfig: z.string().optional(),
    context: z.string().optional(),
  }),

  // Reasoning oracle (Gemini)
  oracle: z.object({
    enabled: envBoolean(true),
    apiKey: z.string().optional(),
    vertexai: envBoolean(false),
    project: z.string().optional(),
    location: z.string().default('us-central1'),
    model: z.string().default('gemini-2.0-flash-001'),
    timeoutMs: z.coerce.number().int().positive().default(30000),
  }),

  // Read-only status server
  server: z.object({
    enabled: envBoolean(true),
    port: z.coerce.number().int().default(8080),
    host: z.string().default('0.0.0.0'),
    corsOrigin: z.string().default('*'),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Empty strings are treated as unset so `.env` templates with blank values
 * fall back to the defaults
 */
function env(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

function buildRawConfig(): Record<string, unknown> {
  return {
    nodeEnv: env('NODE_ENV')?.trim(),
    logLevel: env('LOG_LEVEL')?.trim().toLowerCase(),

    agent: {
      checkIntervalSeconds: env('CHECK_INTERVAL'),
      dryRun: env('DRY_RUN'),
      namespaces: env('WATCH_NAMESPACES'),
      excludedNamespaces: env('EXCLUDED_NAMESPACES'),
      reportDir: env('REPORT_DIR'),
      logTailLines: env('LOG_TAIL_LINES'),
      maxIncidents: env('MAX_INCIDENTS'),
    },

    detection: {
      restartCountThreshold: env('THRESHOLD_RESTART_COUNT'),
    },

    healing: {
      oomMemoryIncrease: env('OOM_MEMORY_INCREASE'),
      oomCpuIncrease: env('OOM_CPU_INCREASE'),
    },

    safety: {
      maxActionsPerHour: env('MAX_ACTIONS_PER_HOUR'),
      cooldownSeconds: env('COOLDOWN_SECONDS'),
    },

    kubernetes: {
      kubeconfig: env('KUBECONFIG'),
      context: env('K8S_CONTEXT'),
    },

    oracle: {
      enabled: env('ORACLE_ENABLED'),
      apiKey: env('GEMINI_API_KEY'),
      vertexai: env('GOOGLE_GENAI_USE_VERTEXAI'),
      project: env('GCP_PROJECT'),
      location: env('VERTEX_AI_LOCATION'),
      model: env('AGENT_MODEL'),
      timeoutMs: env('ORACLE_TIMEOUT_MS'),
    },

    server: {
      enabled: env('DASHBOARD_ENABLED'),
      port: env('DASHBOARD_PORT'),
      host: env('HOST'),
      corsOrigin: env('CORS_ORIGIN'),
    },
  };
}

// Parse and validate configuration
export function loadConfig(): Config {
  return configSchema.parse(buildRawConfig());
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}
