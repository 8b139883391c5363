import crypto from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'winston';
import type { DispatchActor, KitchenOrder, KitchenOrderItem } from '../models/kitchen-order.dto';
import type {
  DispatchFailureKind,
  DispatchJob,
  DispatchPhase,
  DispatchResult,
  DispatchStatistics,
  ValidationFailureDetails,
} from '../models/dispatch.dto';
import type { KitchenAuditOutcome } from '../models/audit.dto';
import type { KitchenOrderRepository } from '../db/kitchen-order.repository';
import type { PrinterTargetRepository } from '../db/printer-target.repository';
import type { DeliveryLedgerRepository, CommittedDelivery } from '../db/delivery-ledger.repository';
import type { AssignmentResolverService } from './assignment-resolver.service';
import type { DispatchValidationService } from './dispatch-validation.service';
import type { RetryQueueService } from './retry-queue.service';
import type { KitchenAuditSink } from './kitchen-audit.service';
import { channelConfirmsDelivery, deliverJob, type DispatchChannels } from './dispatch-channel.service';
import { renderKitchenTicket, toTicketItem } from '../utils/kitchen-ticket';
import { errorMessage } from '../utils/logger';
import { DISPATCH_INTER_TARGET_DELAY_MS, DISPATCH_TIMEOUT_MS } from '../utils/constants';

export interface KitchenDispatchDeps {
  orders: KitchenOrderRepository;
  printers: PrinterTargetRepository;
  ledger: DeliveryLedgerRepository;
  resolver: AssignmentResolverService;
  validator: DispatchValidationService;
  channels: DispatchChannels;
  retryQueue: RetryQueueService;
  audit: KitchenAuditSink;
  logger: Logger;
}

export interface KitchenDispatchOptions {
  timeoutMs?: number;
  interTargetDelayMs?: number;
  now?: () => Date;
  onPhaseChange?: (orderId: string, phase: DispatchPhase) => void;
}

interface StatisticsState {
  totalItemsSent: number;
  totalOrdersSent: number;
  lastSuccessfulSendAt: Date | null;
  printerSuccessCount: Map<string, number>;
  printerFailureCount: Map<string, number>;
}

function emptyStatistics(): StatisticsState {
  return {
    totalItemsSent: 0,
    totalOrdersSent: 0,
    lastSuccessfulSendAt: null,
    printerSuccessCount: new Map(),
    printerFailureCount: new Map(),
  };
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

/** Relay priority: 1 is most urgent */
function jobPriority(order: KitchenOrder): number {
  if (order.isUrgent) return 1;
  return order.priority > 0 ? order.priority : 5;
}

function rejected(
  message: string,
  failureKind: DispatchFailureKind,
  details?: ValidationFailureDetails,
): DispatchResult {
  return {
    success: false,
    outcome: 'rejected',
    message,
    itemsSent: 0,
    printerCount: 0,
    perTargetResults: {},
    queuedEntryIds: [],
    failureKind,
    ...(details ? { details } : {}),
  };
}

/**
 * Sends the unsent items of an order to their kitchen printers.
 *
 * Items are marked sent before any printer is contacted: once an order
 * passes validation it is never sent twice, and a ticket that fails to print
 * is parked in the retry queue instead of blocking the order.
 */
export class KitchenDispatchService {
  private readonly phases = new Map<string, DispatchPhase>();
  private stats: StatisticsState = emptyStatistics();

  private readonly timeoutMs: number;
  private readonly interTargetDelayMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly deps: KitchenDispatchDeps,
    private readonly options: KitchenDispatchOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DISPATCH_TIMEOUT_MS;
    this.interTargetDelayMs = options.interTargetDelayMs ?? DISPATCH_INTER_TARGET_DELAY_MS;
    this.now = options.now ?? (() => new Date());
  }

  /** `idle` unless a dispatch for the order is running */
  getPhase(orderId: string): DispatchPhase {
    return this.phases.get(orderId) ?? 'idle';
  }

  isInFlight(orderId: string): boolean {
    return this.phases.has(orderId);
  }

  async sendToKitchen(orderId: string, actor: DispatchActor): Promise<DispatchResult> {
    if (this.phases.has(orderId)) {
      this.deps.logger.warn('Kitchen dispatch already in progress', { orderId });
      return rejected('Order is already being sent to kitchen', 'already_in_flight');
    }

    this.setPhase(orderId, 'detecting');
    try {
      return await this.run(orderId, actor);
    } catch (error) {
      this.deps.logger.error('Kitchen dispatch failed unexpectedly', { orderId, error: errorMessage(error) });
      return rejected(`Failed to send to kitchen: ${errorMessage(error)}`, 'system_error');
    } finally {
      this.phases.delete(orderId);
      this.options.onPhaseChange?.(orderId, 'idle');
    }
  }

  getStatistics(): DispatchStatistics {
    return {
      totalItemsSent: this.stats.totalItemsSent,
      totalOrdersSent: this.stats.totalOrdersSent,
      lastSuccessfulSendAt: this.stats.lastSuccessfulSendAt ? this.stats.lastSuccessfulSendAt.toISOString() : null,
      printerSuccessCount: Object.fromEntries(this.stats.printerSuccessCount),
      printerFailureCount: Object.fromEntries(this.stats.printerFailureCount),
      inFlightOrders: [...this.phases.keys()],
    };
  }

  resetStatistics(): void {
    this.stats = emptyStatistics();
    this.deps.logger.info('Kitchen dispatch statistics reset');
  }

  private async run(orderId: string, actor: DispatchActor): Promise<DispatchResult> {
    const { logger } = this.deps;

    const order = this.deps.orders.findById(orderId);
    if (!order) {
      return rejected('Order not found', 'order_not_found');
    }

    const newItems = order.items.filter((item) => !item.sentToKitchen);
    if (order.items.length === 0) {
      return rejected('Order has no items to send to kitchen', 'no_items');
    }
    if (newItems.length === 0) {
      return rejected('All items have already been sent to kitchen', 'all_items_sent');
    }

    this.setPhase(orderId, 'validating');
    const validation = await this.deps.validator.validateForDispatch(order);
    if (!validation.isValid) {
      logger.warn('Kitchen dispatch blocked by validation', { orderId, kind: validation.kind });
      return rejected(validation.message, validation.kind, validation.details);
    }

    this.setPhase(orderId, 'segregating');
    const groups = this.deps.resolver.segregateByPrinter(newItems);
    if (groups.size === 0) {
      return rejected('No printers found for order items', 'no_printers_found');
    }

    const { jobs, missingPrinterIds } = this.buildJobs(order, groups);
    if (missingPrinterIds.length > 0) {
      logger.warn('Printer removed after validation, nothing marked sent', { orderId, missingPrinterIds });
      const issues = missingPrinterIds.map((id) => `Printer ${id} not found in configuration`);
      return rejected(
        `Printer configuration issues:\n${issues.map((issue) => `• ${issue}`).join('\n')}`,
        'configuration_issues',
        { issues },
      );
    }
    const perTargetResults: Record<string, boolean> = {};

    this.setPhase(orderId, 'marking_sent');
    const committedAt = this.now();
    const deliveries: CommittedDelivery[] = jobs.flatMap((job) =>
      job.items.map((item) => ({ itemId: item.itemId, printerId: job.printer.id, jobId: job.id })),
    );
    const marked = this.deps.orders.markItemsSent(
      order.id,
      newItems.map((item) => item.id),
      deliveries,
      actor.id,
      committedAt,
    );
    logger.info('Items marked as sent to kitchen', { orderId, items: marked, jobs: jobs.length });

    this.setPhase(orderId, 'dispatching');
    const queuedEntryIds: string[] = [];

    for (const [index, job] of jobs.entries()) {
      if (index > 0 && this.interTargetDelayMs > 0) {
        await delay(this.interTargetDelayMs);
      }

      const attempt: DispatchJob = { ...job, attempt: 1 };
      const result = await deliverJob(this.deps.channels, attempt, this.timeoutMs, logger);
      perTargetResults[job.printer.id] = result.ok;

      if (result.ok) {
        increment(this.stats.printerSuccessCount, job.printer.id);
        if (channelConfirmsDelivery(this.deps.channels, job.printer.connection)) {
          this.deps.ledger.markJob(job.id, 'delivered', this.now());
        }
        this.recordAudit(attempt, actor, 'delivered');
        logger.info('Kitchen ticket printed', { orderId, printerId: job.printer.id, items: job.items.length });
        continue;
      }

      increment(this.stats.printerFailureCount, job.printer.id);
      try {
        const entry = this.deps.retryQueue.enqueue(attempt, result);
        queuedEntryIds.push(entry.id);
        this.recordAudit(attempt, actor, 'queued');
      } catch (error) {
        this.deps.ledger.markJob(job.id, 'failed', this.now());
        this.recordAudit(attempt, actor, 'failed');
        logger.error('Could not queue failed kitchen ticket', {
          orderId,
          jobId: job.id,
          printerId: job.printer.id,
          error: errorMessage(error),
        });
      }
    }

    this.setPhase(orderId, 'aggregating');
    const result = this.aggregate(newItems, perTargetResults, queuedEntryIds);

    this.stats.totalItemsSent += newItems.length;
    this.stats.totalOrdersSent += 1;
    if (result.printerCount > 0) {
      this.stats.lastSuccessfulSendAt = this.now();
    }

    this.setPhase(orderId, 'complete');
    logger.info('Kitchen dispatch complete', {
      orderId,
      outcome: result.outcome,
      itemsSent: result.itemsSent,
      printerCount: result.printerCount,
      queued: queuedEntryIds.length,
    });
    return result;
  }

  private buildJobs(
    order: KitchenOrder,
    groups: Map<string, KitchenOrderItem[]>,
  ): { jobs: DispatchJob[]; missingPrinterIds: string[] } {
    const createdAt = this.now();
    const jobs: DispatchJob[] = [];
    const missingPrinterIds: string[] = [];

    for (const [printerId, items] of groups) {
      const printer = this.deps.printers.findById(printerId);
      if (!printer) {
        missingPrinterIds.push(printerId);
        continue;
      }

      const ticketItems = items.map(toTicketItem);
      jobs.push({
        id: crypto.randomUUID(),
        orderId: order.id,
        orderNumber: order.orderNumber,
        printer: {
          id: printer.id,
          name: printer.name,
          host: printer.host,
          port: printer.port,
          connection: printer.connection,
        },
        items: ticketItems,
        content: renderKitchenTicket(order, ticketItems, printer.name, createdAt),
        priority: jobPriority(order),
        attempt: 0,
        createdAt,
      });
    }

    return { jobs, missingPrinterIds };
  }

  private aggregate(
    newItems: KitchenOrderItem[],
    perTargetResults: Record<string, boolean>,
    queuedEntryIds: string[],
  ): DispatchResult {
    const results = Object.values(perTargetResults);
    const total = results.length;
    const succeeded = results.filter(Boolean).length;
    const itemsSent = newItems.length;

    let outcome: DispatchResult['outcome'];
    let message: string;

    if (total > 0 && succeeded === total) {
      outcome = 'delivered';
      message = `${itemsSent} items sent to kitchen successfully! Printed to ${succeeded} printer(s).`;
    } else if (succeeded > 0) {
      outcome = 'partial';
      message = `${itemsSent} items sent to kitchen! Printed to ${succeeded} of ${total} printers (some prints failed).`;
    } else {
      outcome = 'queued';
      message = `${itemsSent} items marked as sent to kitchen, but all prints failed. Check printer connections.`;
    }

    return {
      success: succeeded > 0,
      outcome,
      message,
      itemsSent,
      printerCount: succeeded,
      perTargetResults,
      queuedEntryIds,
    };
  }

  private recordAudit(job: DispatchJob, actor: DispatchActor, outcome: KitchenAuditOutcome): void {
    const at = this.now();
    for (const item of job.items) {
      this.deps.audit.record({
        orderId: job.orderId,
        orderNumber: job.orderNumber,
        itemId: item.itemId,
        itemName: item.name,
        printerId: job.printer.id,
        printerName: job.printer.name,
        outcome,
        actorId: actor.id,
        actorName: actor.name,
        at,
      });
    }
  }

  private setPhase(orderId: string, phase: DispatchPhase): void {
    this.phases.set(orderId, phase);
    this.options.onPhaseChange?.(orderId, phase);
  }
}
