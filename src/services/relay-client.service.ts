import type { Logger } from 'winston';
import type { DispatchJob, TransmissionResult } from '../models/dispatch.dto';
import type { RelayHeartbeatPayload, RelayPrintJobPayload, RelayRegistration } from '../models/relay.dto';
import {
  RelayQueuedJobsSchema,
  RelayRegistrationResponseSchema,
  RelayStatusUpdateSchema,
  type RelayQueuedJob,
  type RelayStatusUpdate,
} from '../validators/relay.validator';
import { linkSignals, TimeoutError, withTimeout } from '../utils/with-timeout';
import { errorMessage } from '../utils/logger';
import { RELAY_REQUEST_TIMEOUT_MS } from '../utils/constants';

export interface RelayClientConfig {
  baseUrl: string;
  apiKey: string;
  restaurantId: string;
  requestTimeoutMs?: number;
}

export class RelayRequestError extends Error {
  constructor(
    readonly path: string,
    readonly status: number | null,
    message: string,
  ) {
    super(message);
    this.name = 'RelayRequestError';
  }
}

type HttpMethod = 'GET' | 'POST';

/**
 * HTTP client for the cloud print relay. One instance per process; the
 * session id it holds is set by a successful `register`.
 */
export class RelayClient {
  private sessionId: string | null = null;
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;

  constructor(
    private readonly config: RelayClientConfig,
    private readonly logger: Logger,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = config.requestTimeoutMs ?? RELAY_REQUEST_TIMEOUT_MS;
  }

  get restaurantId(): string {
    return this.config.restaurantId;
  }

  getSessionId(): string | null {
    return this.sessionId;
  }

  clearSession(): void {
    this.sessionId = null;
  }

  /**
   * Register this endpoint with the relay and store the session id it hands back
   */
  async register(registration: RelayRegistration): Promise<string> {
    const path = '/restaurants/register';
    const response = await this.send('POST', path, {
      restaurantId: this.config.restaurantId,
      ...registration,
      timestamp: new Date().toISOString(),
    });

    if (response.status !== 200) {
      await this.discard(response);
      throw new RelayRequestError(path, response.status, `Relay registration failed with status ${response.status}`);
    }

    const parsed = RelayRegistrationResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new RelayRequestError(path, response.status, 'Relay registration response did not include a session id');
    }

    this.sessionId = parsed.data.sessionId;
    this.logger.info('Registered with print relay', { restaurantId: this.config.restaurantId });
    return parsed.data.sessionId;
  }

  /**
   * Hand a rendered ticket to the relay for a remote printer
   */
  async submitPrintJob(job: DispatchJob, signal?: AbortSignal): Promise<TransmissionResult> {
    const payload: RelayPrintJobPayload = {
      jobId: job.id,
      orderId: job.orderId,
      orderNumber: job.orderNumber,
      restaurantId: this.config.restaurantId,
      targetPrinterId: job.printer.id,
      content: job.content,
      items: job.items.map((item) => ({ id: item.itemId, name: item.name, quantity: item.quantity })),
      priority: job.priority,
      timestamp: new Date().toISOString(),
    };

    try {
      const response = await this.send('POST', '/print-jobs', payload, signal);
      await this.discard(response);
      if (response.status === 200) {
        this.logger.info('Print job accepted by relay', { jobId: job.id, printerId: job.printer.id });
        return { ok: true };
      }
      return {
        ok: false,
        kind: 'non_success_status',
        error: `Relay rejected print job with status ${response.status}`,
      };
    } catch (error) {
      if (error instanceof TimeoutError || signal?.aborted) {
        return { ok: false, kind: 'timeout', error: errorMessage(error, 'Relay request aborted') };
      }
      return { ok: false, kind: 'network_error', error: errorMessage(error) };
    }
  }

  /**
   * Fetch printer status, confirmations and failures. Resolves null when the
   * relay has nothing new (204).
   */
  async pollStatus(): Promise<RelayStatusUpdate | null> {
    const path = `/status/poll?restaurantId=${encodeURIComponent(this.config.restaurantId)}`;
    const response = await this.send('GET', path);

    if (response.status !== 200) {
      await this.discard(response);
      if (response.status === 204) return null;
      throw new RelayRequestError(path, response.status, `Relay status poll failed with status ${response.status}`);
    }

    const parsed = RelayStatusUpdateSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new RelayRequestError(path, response.status, 'Relay status poll returned an unexpected body');
    }
    return parsed.data;
  }

  /** Resolves false instead of throwing; the session counts the failures. */
  async heartbeat(payload: RelayHeartbeatPayload): Promise<boolean> {
    try {
      const response = await this.send('POST', '/heartbeat', {
        restaurantId: this.config.restaurantId,
        ...payload,
        timestamp: new Date().toISOString(),
      });
      await this.discard(response);
      if (response.status !== 200) {
        this.logger.warn('Relay heartbeat rejected', { status: response.status });
        return false;
      }
      return true;
    } catch (error) {
      this.logger.warn('Relay heartbeat failed', { error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Printer side: jobs the relay is holding for this printer
   */
  async fetchQueuedJobs(printerId: string): Promise<RelayQueuedJob[]> {
    const path = `/print-jobs/poll?printerId=${encodeURIComponent(printerId)}`;
    const response = await this.send('GET', path);

    if (response.status !== 200) {
      await this.discard(response);
      if (response.status === 204) return [];
      throw new RelayRequestError(path, response.status, `Relay job poll failed with status ${response.status}`);
    }

    const parsed = RelayQueuedJobsSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new RelayRequestError(path, response.status, 'Relay job poll returned an unexpected body');
    }
    return parsed.data.jobs;
  }

  /**
   * Printer side: tell the relay which jobs were printed
   */
  async acknowledgeJobs(printerId: string, jobIds: string[]): Promise<boolean> {
    const response = await this.send('POST', '/print-jobs/acknowledge', {
      printerId,
      jobIds,
      timestamp: new Date().toISOString(),
    });
    await this.discard(response);
    return response.status === 200;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.config.apiKey}`,
      'Content-Type': 'application/json',
      'X-Restaurant-ID': this.config.restaurantId,
    };
    if (this.sessionId) {
      headers['X-Session-ID'] = this.sessionId;
    }
    return headers;
  }

  private send(method: HttpMethod, path: string, body?: unknown, signal?: AbortSignal): Promise<Response> {
    return withTimeout(
      (timeoutSignal) =>
        this.fetchImpl(`${this.baseUrl}${path}`, {
          method,
          headers: this.headers(),
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: linkSignals(timeoutSignal, signal),
        }),
      this.requestTimeoutMs,
      `Relay ${method} ${path}`,
    );
  }

  /** Releases a body that will not be read. */
  private async discard(response: Response): Promise<void> {
    if (response.body && !response.bodyUsed) {
      await response.body.cancel();
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      this.logger.warn('Relay response was not valid JSON', { url: response.url, error: errorMessage(error) });
      return null;
    }
  }
}
