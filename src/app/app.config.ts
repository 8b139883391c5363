import { z } from 'zod';
import {
  DEFAULT_PRINTER_PORT,
  DISPATCH_INTER_TARGET_DELAY_MS,
  DISPATCH_TIMEOUT_MS,
  PRINTER_PROBE_TIMEOUT_MS,
  RELAY_AGENT_POLL_INTERVAL_MS,
  RELAY_HEARTBEAT_INTERVAL_MS,
  RELAY_MAX_HEARTBEAT_FAILURES,
  RELAY_MAX_RECONNECT_ATTEMPTS,
  RELAY_POLL_INTERVAL_MS,
  RELAY_RECONNECT_STEP_MS,
  RELAY_REQUEST_TIMEOUT_MS,
  RETRY_BASE_DELAY_MS,
  RETRY_DRAIN_INTERVAL_MS,
  RETRY_MAX_ATTEMPTS,
  RETRY_MAX_DELAY_MS,
} from '../utils/constants';
import { formatZodError } from '../validators/dispatch.validator';

const clamp = (min: number, max: number) => (value: number) => Math.min(Math.max(value, min), max);

const interval = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().default(fallback).transform(clamp(min, max));

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase())));

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  DATABASE_PATH: z.string().min(1).default('data/kitchen-dispatch.db'),
  CORS_ORIGINS: optionalText,

  DISPATCH_TIMEOUT_MS: interval(DISPATCH_TIMEOUT_MS, 1_000, 120_000),
  DISPATCH_INTER_TARGET_DELAY_MS: interval(DISPATCH_INTER_TARGET_DELAY_MS, 0, 10_000),
  PRINTER_PROBE_TIMEOUT_MS: interval(PRINTER_PROBE_TIMEOUT_MS, 250, 30_000),

  RETRY_DRAIN_INTERVAL_MS: interval(RETRY_DRAIN_INTERVAL_MS, 5_000, 5 * 60 * 1000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(100).default(RETRY_MAX_ATTEMPTS),
  RETRY_BASE_DELAY_MS: interval(RETRY_BASE_DELAY_MS, 1_000, 60 * 60 * 1000),
  RETRY_MAX_DELAY_MS: interval(RETRY_MAX_DELAY_MS, 1_000, 24 * 60 * 60 * 1000),

  RELAY_ENABLED: booleanFlag(false),
  RELAY_BASE_URL: optionalText,
  RELAY_API_KEY: optionalText,
  RELAY_RESTAURANT_ID: optionalText,
  RELAY_RESTAURANT_NAME: z.string().default('Kitchen Dispatch'),
  RELAY_POLL_INTERVAL_MS: interval(RELAY_POLL_INTERVAL_MS, 1_000, 5 * 60 * 1000),
  RELAY_HEARTBEAT_INTERVAL_MS: interval(RELAY_HEARTBEAT_INTERVAL_MS, 5_000, 10 * 60 * 1000),
  RELAY_MAX_HEARTBEAT_FAILURES: z.coerce.number().int().min(1).max(20).default(RELAY_MAX_HEARTBEAT_FAILURES),
  RELAY_RECONNECT_STEP_MS: interval(RELAY_RECONNECT_STEP_MS, 500, 5 * 60 * 1000),
  RELAY_MAX_RECONNECT_ATTEMPTS: z.coerce.number().int().min(1).max(50).default(RELAY_MAX_RECONNECT_ATTEMPTS),
  RELAY_REQUEST_TIMEOUT_MS: interval(RELAY_REQUEST_TIMEOUT_MS, 1_000, 60_000),

  RELAY_AGENT_PRINTER_ID: optionalText,
  RELAY_AGENT_PRINTER_HOST: optionalText,
  RELAY_AGENT_PRINTER_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PRINTER_PORT),
  RELAY_AGENT_POLL_INTERVAL_MS: interval(RELAY_AGENT_POLL_INTERVAL_MS, 1_000, 5 * 60 * 1000),
});

export interface RelayConfig {
  baseUrl: string;
  apiKey: string;
  restaurantId: string;
  restaurantName: string;
  pollIntervalMs: number;
  heartbeatIntervalMs: number;
  maxHeartbeatFailures: number;
  reconnectStepMs: number;
  maxReconnectAttempts: number;
  requestTimeoutMs: number;
}

export interface AgentConfig {
  printerId: string;
  printerHost: string;
  printerPort: number;
  pollIntervalMs: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;
  databasePath: string;
  /** `true` allows any origin */
  corsOrigins: string[] | true;
  dispatch: {
    timeoutMs: number;
    interTargetDelayMs: number;
    probeTimeoutMs: number;
  };
  retry: {
    drainIntervalMs: number;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  relay: RelayConfig | null;
  agent: AgentConfig | null;
}

/**
 * Build the typed configuration from environment variables. Throws when a
 * value fails to parse or when the relay is enabled without its credentials.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${formatZodError(parsed.error)}`);
  }
  const e = parsed.data;

  let relay: RelayConfig | null = null;
  if (e.RELAY_ENABLED) {
    const { RELAY_BASE_URL: baseUrl, RELAY_API_KEY: apiKey, RELAY_RESTAURANT_ID: restaurantId } = e;
    if (!baseUrl || !apiKey || !restaurantId) {
      const missing = Object.entries({
        RELAY_BASE_URL: baseUrl,
        RELAY_API_KEY: apiKey,
        RELAY_RESTAURANT_ID: restaurantId,
      })
        .filter(([, value]) => !value)
        .map(([name]) => name);
      throw new Error(`RELAY_ENABLED is set but these variables are missing: ${missing.join(', ')}`);
    }

    relay = {
      baseUrl,
      apiKey,
      restaurantId,
      restaurantName: e.RELAY_RESTAURANT_NAME,
      pollIntervalMs: e.RELAY_POLL_INTERVAL_MS,
      heartbeatIntervalMs: e.RELAY_HEARTBEAT_INTERVAL_MS,
      maxHeartbeatFailures: e.RELAY_MAX_HEARTBEAT_FAILURES,
      reconnectStepMs: e.RELAY_RECONNECT_STEP_MS,
      maxReconnectAttempts: e.RELAY_MAX_RECONNECT_ATTEMPTS,
      requestTimeoutMs: e.RELAY_REQUEST_TIMEOUT_MS,
    };
  }

  const agent: AgentConfig | null =
    e.RELAY_AGENT_PRINTER_ID && e.RELAY_AGENT_PRINTER_HOST
      ? {
          printerId: e.RELAY_AGENT_PRINTER_ID,
          printerHost: e.RELAY_AGENT_PRINTER_HOST,
          printerPort: e.RELAY_AGENT_PRINTER_PORT,
          pollIntervalMs: e.RELAY_AGENT_POLL_INTERVAL_MS,
        }
      : null;

  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    databasePath: e.DATABASE_PATH,
    corsOrigins: e.CORS_ORIGINS
      ? e.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter((origin) => origin.length > 0)
      : true,
    dispatch: {
      timeoutMs: e.DISPATCH_TIMEOUT_MS,
      interTargetDelayMs: e.DISPATCH_INTER_TARGET_DELAY_MS,
      probeTimeoutMs: e.PRINTER_PROBE_TIMEOUT_MS,
    },
    retry: {
      drainIntervalMs: e.RETRY_DRAIN_INTERVAL_MS,
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      // Backoff never outlasts a drain cycle
      maxDelayMs: Math.min(e.RETRY_MAX_DELAY_MS, e.RETRY_DRAIN_INTERVAL_MS),
    },
    relay,
    agent,
  };
}
