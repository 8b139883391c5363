import net from 'node:net';
import type { Logger } from 'winston';
import type { PrinterAddress } from '../models/printer.dto';
import type { TransmissionResult } from '../models/dispatch.dto';
import { PRINTER_PROBE_TIMEOUT_MS } from '../utils/constants';

/**
 * Single-attempt delivery of rendered ticket text to one printer.
 * Retrying is the caller's job.
 */
export interface PrintTransport {
  print(address: PrinterAddress, content: string, signal?: AbortSignal): Promise<TransmissionResult>;
  probe(address: PrinterAddress, timeoutMs?: number): Promise<boolean>;
}

export interface NetworkPrintTransportOptions {
  /** Socket inactivity limit in ms (default: 10000) */
  socketTimeoutMs?: number;
}

const DEFAULT_SOCKET_TIMEOUT_MS = 10_000;

/**
 * Raw TCP transport for network printers listening on port 9100 or similar.
 */
export class NetworkPrintTransport implements PrintTransport {
  private readonly socketTimeoutMs: number;

  constructor(
    private readonly logger: Logger,
    options: NetworkPrintTransportOptions = {},
  ) {
    this.socketTimeoutMs = options.socketTimeoutMs ?? DEFAULT_SOCKET_TIMEOUT_MS;
  }

  print(address: PrinterAddress, content: string, signal?: AbortSignal): Promise<TransmissionResult> {
    const target = `${address.host}:${address.port}`;

    if (signal?.aborted) {
      return Promise.resolve({ ok: false, kind: 'timeout', error: `Print to ${target} aborted before connecting` });
    }

    return new Promise<TransmissionResult>((resolve) => {
      let settled = false;
      const socket = net.createConnection({ host: address.host, port: address.port });

      const finish = (result: TransmissionResult): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        socket.destroy();
        if (!result.ok) {
          this.logger.warn('Printer transmission failed', { target, kind: result.kind, error: result.error });
        }
        resolve(result);
      };

      const onAbort = (): void => {
        finish({ ok: false, kind: 'timeout', error: `Print to ${target} aborted` });
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      socket.setNoDelay(true);
      socket.setTimeout(this.socketTimeoutMs, () => {
        finish({ ok: false, kind: 'timeout', error: `Printer ${target} stopped responding` });
      });

      socket.once('error', (error: Error) => {
        finish({ ok: false, kind: 'network_error', error: error.message });
      });

      socket.once('connect', () => {
        socket.end(Buffer.from(content, 'utf-8'), () => {
          this.logger.debug('Ticket written to printer', { target, bytes: Buffer.byteLength(content, 'utf-8') });
          finish({ ok: true });
        });
      });
    });
  }

  /**
   * Opens and immediately closes a connection to check the printer is listening.
   */
  probe(address: PrinterAddress, timeoutMs: number = PRINTER_PROBE_TIMEOUT_MS): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const socket = net.createConnection({ host: address.host, port: address.port });

      const done = (reachable: boolean): void => {
        clearTimeout(timer);
        socket.destroy();
        resolve(reachable);
      };

      const timer = setTimeout(() => done(false), timeoutMs);
      socket.once('connect', () => done(true));
      socket.once('error', () => done(false));
    });
  }
}
