import type { Logger } from 'winston';
import type { PrinterTarget } from '../models/printer.dto';
import type { PrintTransport } from './network-print.transport';
import type { RelayPrinterStatusSource } from './relay-status-monitor.service';
import { PRINTER_PROBE_TIMEOUT_MS } from '../utils/constants';

export interface ReachabilityChecker {
  isReachable(printer: PrinterTarget): Promise<boolean>;
}

/**
 * Network printers are probed over TCP. Relay printers are reachable when the
 * relay session is up and the relay has not reported them offline.
 */
export class PrinterStatusService implements ReachabilityChecker {
  constructor(
    private readonly transport: PrintTransport,
    private readonly logger: Logger,
    private readonly probeTimeoutMs: number = PRINTER_PROBE_TIMEOUT_MS,
    private readonly relayStatus: RelayPrinterStatusSource | null = null,
  ) {}

  async isReachable(printer: PrinterTarget): Promise<boolean> {
    if (printer.connection === 'relay') {
      if (!this.relayStatus || !this.relayStatus.isRelayConnected()) {
        this.logger.warn('Relay printer unreachable: relay not connected', { printerId: printer.id });
        return false;
      }
      return this.relayStatus.isPrinterOnline(printer.id) ?? true;
    }

    const reachable = await this.transport.probe(printer, this.probeTimeoutMs);
    if (!reachable) {
      this.logger.warn('Printer did not answer probe', {
        printerId: printer.id,
        address: `${printer.host}:${printer.port}`,
      });
    }
    return reachable;
  }
}
