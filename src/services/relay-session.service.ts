import type { Logger } from 'winston';
import type { RelayConnectionState, RelayRegistration, RelaySessionSnapshot } from '../models/relay.dto';
import type { RelayClient } from './relay-client.service';
import { linearBackoffMs } from '../utils/backoff';
import { errorMessage } from '../utils/logger';
import {
  RELAY_HEARTBEAT_INTERVAL_MS,
  RELAY_MAX_HEARTBEAT_FAILURES,
  RELAY_MAX_RECONNECT_ATTEMPTS,
  RELAY_RECONNECT_STEP_MS,
} from '../utils/constants';

export interface RelayQueueCounts {
  pendingOrders: number;
  failedOrders: number;
}

export interface RelaySessionOptions {
  registration: RelayRegistration;
  heartbeatIntervalMs?: number;
  maxHeartbeatFailures?: number;
  reconnectStepMs?: number;
  maxReconnectAttempts?: number;
  /** Counts reported with every heartbeat */
  queueCounts?: () => RelayQueueCounts;
  now?: () => Date;
}

/**
 * Connection lifecycle against the relay: register, heartbeat, and linear
 * reconnects. After `maxReconnectAttempts` the session sits in `down` until
 * `reinitialize` is called.
 */
export class RelaySession {
  private state: RelayConnectionState = 'idle';
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeatInFlight = false;
  private heartbeatFailures = 0;
  private reconnectAttempts = 0;
  private lastHeartbeatAt: Date | null = null;

  private readonly heartbeatIntervalMs: number;
  private readonly maxHeartbeatFailures: number;
  private readonly reconnectStepMs: number;
  private readonly maxReconnectAttempts: number;
  private readonly now: () => Date;

  constructor(
    private readonly client: RelayClient,
    private readonly logger: Logger,
    private readonly options: RelaySessionOptions,
  ) {
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? RELAY_HEARTBEAT_INTERVAL_MS;
    this.maxHeartbeatFailures = options.maxHeartbeatFailures ?? RELAY_MAX_HEARTBEAT_FAILURES;
    this.reconnectStepMs = options.reconnectStepMs ?? RELAY_RECONNECT_STEP_MS;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? RELAY_MAX_RECONNECT_ATTEMPTS;
    this.now = options.now ?? (() => new Date());
  }

  getState(): RelayConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  getSnapshot(): RelaySessionSnapshot {
    return {
      state: this.state,
      sessionId: this.client.getSessionId(),
      lastHeartbeatAt: this.lastHeartbeatAt ? this.lastHeartbeatAt.toISOString() : null,
      heartbeatFailures: this.heartbeatFailures,
      reconnectAttempts: this.reconnectAttempts,
    };
  }

  /**
   * Register with the relay. On failure a reconnect is scheduled and false is returned.
   */
  async start(): Promise<boolean> {
    if (this.state === 'connected') return true;
    if (this.state === 'down') {
      this.logger.warn('Relay session is down; call reinitialize to retry');
      return false;
    }

    this.state = 'connecting';
    const registered = await this.register();
    if (!registered && this.state === 'connecting') {
      this.scheduleReconnect();
    }
    return registered;
  }

  /** Clears the retry budget and starts over. */
  async reinitialize(): Promise<boolean> {
    this.stop();
    this.reconnectAttempts = 0;
    this.heartbeatFailures = 0;
    this.logger.info('Reinitializing relay session');
    return this.start();
  }

  stop(): void {
    this.clearHeartbeat();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.state = 'idle';
  }

  /**
   * Send one heartbeat. Consecutive failures up to the cap drop the
   * connection and start reconnecting.
   */
  async heartbeat(): Promise<boolean> {
    if (this.state !== 'connected' || this.heartbeatInFlight) return false;

    this.heartbeatInFlight = true;
    try {
      const counts = this.options.queueCounts?.() ?? { pendingOrders: 0, failedOrders: 0 };
      const ok = await this.client.heartbeat({ status: 'active', ...counts });

      if (ok) {
        this.heartbeatFailures = 0;
        this.lastHeartbeatAt = this.now();
        return true;
      }

      this.heartbeatFailures += 1;
      this.logger.warn('Relay heartbeat missed', {
        failures: this.heartbeatFailures,
        maxFailures: this.maxHeartbeatFailures,
      });

      if (this.heartbeatFailures >= this.maxHeartbeatFailures && this.state === 'connected') {
        this.logger.error('Relay connection lost after repeated heartbeat failures');
        this.client.clearSession();
        this.scheduleReconnect();
      }
      return false;
    } catch (error) {
      this.logger.error('Relay heartbeat errored', { error: errorMessage(error) });
      return false;
    } finally {
      this.heartbeatInFlight = false;
    }
  }

  private async register(): Promise<boolean> {
    try {
      await this.client.register(this.options.registration);
      this.state = 'connected';
      this.heartbeatFailures = 0;
      this.reconnectAttempts = 0;
      this.lastHeartbeatAt = this.now();
      this.startHeartbeat();
      this.logger.info('Relay session connected', { name: this.options.registration.name });
      return true;
    } catch (error) {
      this.logger.warn('Relay registration failed', { error: errorMessage(error) });
      return false;
    }
  }

  private scheduleReconnect(): void {
    this.clearHeartbeat();
    this.reconnectAttempts += 1;

    if (this.reconnectAttempts > this.maxReconnectAttempts) {
      this.state = 'down';
      this.client.clearSession();
      this.logger.error('Relay reconnect attempts exhausted', { attempts: this.maxReconnectAttempts });
      return;
    }

    this.state = 'reconnecting';
    const delayMs = linearBackoffMs(this.reconnectAttempts, this.reconnectStepMs);
    this.logger.info('Scheduling relay reconnect', { attempt: this.reconnectAttempts, delayMs });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.reconnect();
    }, delayMs);
    this.reconnectTimer.unref();
  }

  private async reconnect(): Promise<void> {
    if (this.state !== 'reconnecting') return;
    const registered = await this.register();
    if (!registered && this.state === 'reconnecting') {
      this.scheduleReconnect();
    }
  }

  private startHeartbeat(): void {
    this.clearHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      void this.heartbeat();
    }, this.heartbeatIntervalMs);
    this.heartbeatTimer.unref();
  }

  private clearHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}
