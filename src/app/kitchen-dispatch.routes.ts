import { Router, type Request, type Response } from 'express';
import type { Logger } from 'winston';
import type { DispatchResult } from '../models/dispatch.dto';
import type { KitchenOrderRepository } from '../db/kitchen-order.repository';
import type { DeliveryLedgerRepository } from '../db/delivery-ledger.repository';
import type { KitchenDispatchService } from '../services/kitchen-dispatch.service';
import type { DispatchValidationService } from '../services/dispatch-validation.service';
import type { RetryQueueService } from '../services/retry-queue.service';
import type { RelayStatusMonitor } from '../services/relay-status-monitor.service';
import { DispatchRequestSchema, formatZodError } from '../validators/dispatch.validator';

export interface KitchenDispatchRouterDeps {
  orders: KitchenOrderRepository;
  ledger: DeliveryLedgerRepository;
  dispatch: KitchenDispatchService;
  validator: DispatchValidationService;
  retryQueue: RetryQueueService;
  relay: { monitor: RelayStatusMonitor } | null;
}

export function dispatchStatus(result: DispatchResult): number {
  if (result.success) return 200;
  switch (result.failureKind) {
    case 'already_in_flight':
      return 409;
    case 'order_not_found':
      return 404;
    case 'system_error':
      return 500;
    case undefined:
      // committed, every print queued
      return 502;
    default:
      return 422;
  }
}

export function createKitchenDispatchRouter(deps: KitchenDispatchRouterDeps, logger: Logger): Router {
  const router = Router();

  /**
   * POST /orders/:orderId/kitchen/validate
   * Run the pre-flight checks without changing anything
   */
  router.post('/orders/:orderId/kitchen/validate', async (req: Request, res: Response) => {
    try {
      const { orderId } = req.params;
      const order = deps.orders.findById(orderId);
      if (!order) {
        res.status(404).json({ error: 'Order not found' });
        return;
      }

      const result = await deps.validator.validate(order);
      res.status(result.isValid ? 200 : 422).json(result);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to validate order';
      logger.error('Error validating order for kitchen', { error: message });
      res.status(500).json({ error: message });
    }
  });

  /**
   * POST /orders/:orderId/kitchen/dispatch
   * Send the order's unsent items to their kitchen printers
   */
  router.post('/orders/:orderId/kitchen/dispatch', async (req: Request, res: Response) => {
    try {
      const parsed = DispatchRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: formatZodError(parsed.error) });
        return;
      }

      const { orderId } = req.params;
      const result = await deps.dispatch.sendToKitchen(orderId, {
        id: parsed.data.actorId,
        name: parsed.data.actorName,
      });
      res.status(dispatchStatus(result)).json(result);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to send order to kitchen';
      logger.error('Error dispatching order to kitchen', { error: message });
      res.status(500).json({ error: message });
    }
  });

  /**
   * GET /orders/:orderId/kitchen/deliveries
   * Per item and printer delivery state
   */
  router.get('/orders/:orderId/kitchen/deliveries', (req: Request, res: Response) => {
    try {
      res.json(deps.ledger.findByOrder(req.params.orderId));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to load deliveries';
      logger.error('Error loading kitchen deliveries', { error: message });
      res.status(500).json({ error: message });
    }
  });

  router.get('/kitchen/stats', (_req: Request, res: Response) => {
    try {
      res.json({
        dispatch: deps.dispatch.getStatistics(),
        queue: deps.retryQueue.getStatistics(),
        relay: deps.relay
          ? { ...deps.relay.monitor.getStatistics(), printers: deps.relay.monitor.getPrinterStates() }
          : null,
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to load statistics';
      logger.error('Error loading kitchen statistics', { error: message });
      res.status(500).json({ error: message });
    }
  });

  router.get('/kitchen/queue', (_req: Request, res: Response) => {
    try {
      res.json(deps.retryQueue.listPending());
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to list queued jobs';
      logger.error('Error listing retry queue', { error: message });
      res.status(500).json({ error: message });
    }
  });

  router.get('/kitchen/queue/dead-letter', (_req: Request, res: Response) => {
    try {
      res.json(deps.retryQueue.listDeadLetter());
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to list dead letters';
      logger.error('Error listing dead letters', { error: message });
      res.status(500).json({ error: message });
    }
  });

  /**
   * POST /kitchen/queue/drain
   * Replay due entries now instead of waiting for the timer
   */
  router.post('/kitchen/queue/drain', async (_req: Request, res: Response) => {
    try {
      const summary = await deps.retryQueue.drain();
      res.status(summary.skipped ? 409 : 200).json(summary);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to drain retry queue';
      logger.error('Error draining retry queue', { error: message });
      res.status(500).json({ error: message });
    }
  });

  router.post('/kitchen/queue/:entryId/requeue', (req: Request, res: Response) => {
    try {
      const entry = deps.retryQueue.requeue(req.params.entryId);
      if (!entry) {
        res.status(404).json({ error: 'Queue entry not found' });
        return;
      }
      res.json(entry);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to requeue entry';
      logger.error('Error requeueing entry', { error: message });
      res.status(500).json({ error: message });
    }
  });

  router.delete('/kitchen/queue/:entryId', (req: Request, res: Response) => {
    try {
      if (!deps.retryQueue.discard(req.params.entryId)) {
        res.status(404).json({ error: 'Queue entry not found' });
        return;
      }
      res.json({ success: true });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to discard entry';
      logger.error('Error discarding entry', { error: message });
      res.status(500).json({ error: message });
    }
  });

  return router;
}
