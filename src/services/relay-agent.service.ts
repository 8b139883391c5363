import type { Logger } from 'winston';
import type { PrinterAddress } from '../models/printer.dto';
import type { PrintTransport } from './network-print.transport';
import type { RelayClient } from './relay-client.service';
import type { RelaySession } from './relay-session.service';
import { TimeoutError, withTimeout } from '../utils/with-timeout';
import { errorMessage } from '../utils/logger';
import { DISPATCH_TIMEOUT_MS, RELAY_AGENT_POLL_INTERVAL_MS } from '../utils/constants';

export interface RelayAgentOptions {
  printerId: string;
  printer: PrinterAddress;
  pollIntervalMs?: number;
  printTimeoutMs?: number;
}

export interface AgentPollSummary {
  received: number;
  printed: number;
  failed: number;
}

export interface RelayAgentStatistics {
  ordersReceived: number;
  ordersPrinted: number;
  failedPrints: number;
  lastActivityAt: string | null;
}

const EMPTY_POLL: AgentPollSummary = { received: 0, printed: 0, failed: 0 };

/**
 * Printer-side half of the relay: pulls queued jobs for one printer, prints
 * them on the local network and acknowledges the ones that printed.
 */
export class RelayAgentService {
  private timer: NodeJS.Timeout | null = null;
  private polling = false;
  private ordersReceived = 0;
  private ordersPrinted = 0;
  private failedPrints = 0;
  private lastActivityAt: Date | null = null;
  private readonly pollIntervalMs: number;
  private readonly printTimeoutMs: number;

  constructor(
    private readonly client: RelayClient,
    private readonly session: RelaySession,
    private readonly transport: PrintTransport,
    private readonly logger: Logger,
    private readonly options: RelayAgentOptions,
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? RELAY_AGENT_POLL_INTERVAL_MS;
    this.printTimeoutMs = options.printTimeoutMs ?? DISPATCH_TIMEOUT_MS;
  }

  async start(): Promise<boolean> {
    const connected = await this.session.start();
    if (!this.timer) {
      this.timer = setInterval(() => {
        void this.pollOnce();
      }, this.pollIntervalMs);
      this.timer.unref();
    }
    this.logger.info('Relay agent started', {
      printerId: this.options.printerId,
      connected,
      pollIntervalMs: this.pollIntervalMs,
    });
    return connected;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.session.stop();
  }

  getStatistics(): RelayAgentStatistics {
    return {
      ordersReceived: this.ordersReceived,
      ordersPrinted: this.ordersPrinted,
      failedPrints: this.failedPrints,
      lastActivityAt: this.lastActivityAt ? this.lastActivityAt.toISOString() : null,
    };
  }

  /**
   * Jobs that fail to print are not acknowledged, so the relay hands them out again.
   */
  async pollOnce(): Promise<AgentPollSummary> {
    if (!this.session.isConnected() || this.polling) return { ...EMPTY_POLL };

    this.polling = true;
    try {
      const jobs = await this.client.fetchQueuedJobs(this.options.printerId);
      if (jobs.length === 0) return { ...EMPTY_POLL };

      this.ordersReceived += jobs.length;
      this.lastActivityAt = new Date();
      this.logger.info('Received relay print jobs', { printerId: this.options.printerId, count: jobs.length });

      const printed: string[] = [];
      let failed = 0;

      for (const job of jobs) {
        const ok = await this.printLocally(job.id, job.content);
        if (ok) {
          printed.push(job.id);
        } else {
          failed += 1;
        }
      }

      this.ordersPrinted += printed.length;
      this.failedPrints += failed;

      if (printed.length > 0) {
        const acknowledged = await this.client.acknowledgeJobs(this.options.printerId, printed);
        if (!acknowledged) {
          this.logger.warn('Relay did not accept acknowledgement', { jobIds: printed });
        }
      }

      return { received: jobs.length, printed: printed.length, failed };
    } catch (error) {
      this.logger.warn('Relay agent poll failed', { printerId: this.options.printerId, error: errorMessage(error) });
      return { ...EMPTY_POLL };
    } finally {
      this.polling = false;
    }
  }

  private async printLocally(jobId: string, content: string): Promise<boolean> {
    try {
      const result = await withTimeout(
        (signal) => this.transport.print(this.options.printer, content, signal),
        this.printTimeoutMs,
        `Local print of job ${jobId}`,
      );
      if (!result.ok) {
        this.logger.error('Local print failed', { jobId, kind: result.kind, error: result.error });
      }
      return result.ok;
    } catch (error) {
      const kind = error instanceof TimeoutError ? 'timeout' : 'network_error';
      this.logger.error('Local print failed', { jobId, kind, error: errorMessage(error) });
      return false;
    }
  }
}
