import type { Logger } from 'winston';
import type { PrinterConnection } from '../models/printer.dto';
import type { DispatchJob, TransmissionResult } from '../models/dispatch.dto';
import type { PrinterTargetRepository } from '../db/printer-target.repository';
import type { PrintTransport } from './network-print.transport';
import type { RelayClient } from './relay-client.service';
import type { RelaySession } from './relay-session.service';
import { TimeoutError, withTimeout } from '../utils/with-timeout';
import { errorMessage } from '../utils/logger';

/**
 * A route from a dispatch job to a printer. `confirmsDelivery` is true when a
 * successful `deliver` means the printer has the ticket, false when a remote
 * confirmation is still to come.
 */
export interface DispatchChannel {
  readonly connection: PrinterConnection;
  readonly confirmsDelivery: boolean;
  deliver(job: DispatchJob, signal: AbortSignal): Promise<TransmissionResult>;
}

export type DispatchChannels = Partial<Record<PrinterConnection, DispatchChannel>>;

export class DirectPrintChannel implements DispatchChannel {
  readonly connection = 'network' as const;
  readonly confirmsDelivery = true;

  constructor(
    private readonly transport: PrintTransport,
    private readonly printers: PrinterTargetRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async deliver(job: DispatchJob, signal: AbortSignal): Promise<TransmissionResult> {
    const result = await this.transport.print(job.printer, job.content, signal);
    if (result.ok) {
      this.printers.touchLastConnected(job.printer.id, this.now());
    }
    return result;
  }
}

export class RelayPrintChannel implements DispatchChannel {
  readonly connection = 'relay' as const;
  readonly confirmsDelivery = false;

  constructor(
    private readonly client: RelayClient,
    private readonly session: RelaySession,
  ) {}

  async deliver(job: DispatchJob, signal: AbortSignal): Promise<TransmissionResult> {
    if (!this.session.isConnected()) {
      return { ok: false, kind: 'network_error', error: 'Relay connection is not established' };
    }
    return this.client.submitPrintJob(job, signal);
  }
}

/**
 * Runs one bounded delivery attempt over the channel matching the job's
 * printer. Never throws: every failure comes back as a TransmissionResult.
 */
export async function deliverJob(
  channels: DispatchChannels,
  job: DispatchJob,
  timeoutMs: number,
  logger: Logger,
): Promise<TransmissionResult> {
  const channel = channels[job.printer.connection];
  if (!channel) {
    return {
      ok: false,
      kind: 'network_error',
      error: `No ${job.printer.connection} channel configured for printer ${job.printer.name}`,
    };
  }

  try {
    return await withTimeout(
      (signal) => channel.deliver(job, signal),
      timeoutMs,
      `Print to ${job.printer.name}`,
    );
  } catch (error) {
    if (error instanceof TimeoutError) {
      logger.warn('Print attempt timed out', { jobId: job.id, printerId: job.printer.id, timeoutMs });
      return { ok: false, kind: 'timeout', error: error.message };
    }
    logger.error('Print attempt threw', { jobId: job.id, printerId: job.printer.id, error: errorMessage(error) });
    return { ok: false, kind: 'network_error', error: errorMessage(error) };
  }
}

export function channelConfirmsDelivery(channels: DispatchChannels, connection: PrinterConnection): boolean {
  return channels[connection]?.confirmsDelivery ?? false;
}
