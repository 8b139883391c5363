import type { Logger } from 'winston';
import type { AppConfig } from './app.config';
import type { SqliteDatabase } from '../db/database';
import { KitchenOrderRepository } from '../db/kitchen-order.repository';
import { PrinterTargetRepository } from '../db/printer-target.repository';
import { PrinterAssignmentRepository } from '../db/printer-assignment.repository';
import { DeliveryLedgerRepository } from '../db/delivery-ledger.repository';
import { PendingJobRepository } from '../db/pending-job.repository';
import { AssignmentResolverService } from '../services/assignment-resolver.service';
import { DispatchValidationService } from '../services/dispatch-validation.service';
import { KitchenDispatchService } from '../services/kitchen-dispatch.service';
import { RetryQueueService } from '../services/retry-queue.service';
import { PrinterStatusService, type ReachabilityChecker } from '../services/printer-status.service';
import { LoggerKitchenAuditSink, type KitchenAuditSink } from '../services/kitchen-audit.service';
import { NetworkPrintTransport, type PrintTransport } from '../services/network-print.transport';
import { DirectPrintChannel, RelayPrintChannel, type DispatchChannels } from '../services/dispatch-channel.service';
import { RelayClient } from '../services/relay-client.service';
import { RelaySession } from '../services/relay-session.service';
import { RelayStatusMonitor } from '../services/relay-status-monitor.service';

export interface RelayServices {
  client: RelayClient;
  session: RelaySession;
  monitor: RelayStatusMonitor;
}

export interface ServiceContainer {
  orders: KitchenOrderRepository;
  printers: PrinterTargetRepository;
  ledger: DeliveryLedgerRepository;
  resolver: AssignmentResolverService;
  validator: DispatchValidationService;
  dispatch: KitchenDispatchService;
  retryQueue: RetryQueueService;
  relay: RelayServices | null;
}

/** Test seams; production wiring leaves these unset */
export interface ContainerOverrides {
  transport?: PrintTransport;
  channels?: DispatchChannels;
  reachability?: ReachabilityChecker;
  audit?: KitchenAuditSink;
  fetchImpl?: typeof fetch;
  now?: () => Date;
  random?: () => number;
}

export function createServiceContainer(
  config: AppConfig,
  db: SqliteDatabase,
  logger: Logger,
  overrides: ContainerOverrides = {},
): ServiceContainer {
  const now = overrides.now ?? (() => new Date());

  const ledger = new DeliveryLedgerRepository(db);
  const orders = new KitchenOrderRepository(db, ledger);
  const printers = new PrinterTargetRepository(db);
  const assignments = new PrinterAssignmentRepository(db);
  const pendingJobs = new PendingJobRepository(db, logger);

  const transport = overrides.transport ?? new NetworkPrintTransport(logger);
  const audit = overrides.audit ?? new LoggerKitchenAuditSink(logger);

  const channels: DispatchChannels = overrides.channels ?? {
    network: new DirectPrintChannel(transport, printers, now),
  };

  const retryQueue = new RetryQueueService(
    { repository: pendingJobs, ledger, printers, channels, audit, logger },
    {
      maxAttempts: config.retry.maxAttempts,
      baseDelayMs: config.retry.baseDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      drainIntervalMs: config.retry.drainIntervalMs,
      timeoutMs: config.dispatch.timeoutMs,
      now,
      random: overrides.random,
    },
  );

  let relay: RelayServices | null = null;
  if (config.relay) {
    const client = new RelayClient(
      {
        baseUrl: config.relay.baseUrl,
        apiKey: config.relay.apiKey,
        restaurantId: config.relay.restaurantId,
        requestTimeoutMs: config.relay.requestTimeoutMs,
      },
      logger,
      overrides.fetchImpl,
    );
    const session = new RelaySession(client, logger, {
      registration: { name: config.relay.restaurantName, capabilities: ['kitchen_tickets', 'status_updates'] },
      heartbeatIntervalMs: config.relay.heartbeatIntervalMs,
      maxHeartbeatFailures: config.relay.maxHeartbeatFailures,
      reconnectStepMs: config.relay.reconnectStepMs,
      maxReconnectAttempts: config.relay.maxReconnectAttempts,
      queueCounts: () => ({ pendingOrders: retryQueue.size(), failedOrders: retryQueue.getStatistics().deadLetter }),
      now,
    });
    const monitor = new RelayStatusMonitor(client, session, ledger, logger, config.relay.pollIntervalMs, now);

    if (!overrides.channels) {
      channels.relay = new RelayPrintChannel(client, session);
    }
    relay = { client, session, monitor };
  }

  const reachability =
    overrides.reachability ??
    new PrinterStatusService(transport, logger, config.dispatch.probeTimeoutMs, relay ? relay.monitor : null);

  const resolver = new AssignmentResolverService(assignments, printers, logger, now);
  const validator = new DispatchValidationService(resolver, printers, reachability, logger, now);
  const dispatch = new KitchenDispatchService(
    { orders, printers, ledger, resolver, validator, channels, retryQueue, audit, logger },
    {
      timeoutMs: config.dispatch.timeoutMs,
      interTargetDelayMs: config.dispatch.interTargetDelayMs,
      now,
    },
  );

  return { orders, printers, ledger, resolver, validator, dispatch, retryQueue, relay };
}
