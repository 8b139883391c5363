export const DEFAULT_PRINTER_PORT = 9100;

export const DISPATCH_TIMEOUT_MS = 15_000;
export const DISPATCH_INTER_TARGET_DELAY_MS = 500;
export const PRINTER_PROBE_TIMEOUT_MS = 3_000;

export const RETRY_DRAIN_INTERVAL_MS = 2 * 60 * 1000;
export const RETRY_MAX_ATTEMPTS = 10;
export const RETRY_BASE_DELAY_MS = 30_000;
export const RETRY_MAX_DELAY_MS = RETRY_DRAIN_INTERVAL_MS;

export const RELAY_POLL_INTERVAL_MS = 10_000;
export const RELAY_AGENT_POLL_INTERVAL_MS = 5_000;
export const RELAY_HEARTBEAT_INTERVAL_MS = 60_000;
export const RELAY_MAX_HEARTBEAT_FAILURES = 3;
export const RELAY_RECONNECT_STEP_MS = 5_000;
export const RELAY_MAX_RECONNECT_ATTEMPTS = 5;
export const RELAY_REQUEST_TIMEOUT_MS = 10_000;

export const TICKET_WIDTH = 32;
