import { Router, type Request, type Response } from 'express';
import type { Logger } from 'winston';
import type { AssignmentResolverService } from '../services/assignment-resolver.service';
import { AutoAssignRequestSchema, ResolveQuerySchema, formatZodError } from '../validators/dispatch.validator';

export function createPrinterAssignmentRouter(resolver: AssignmentResolverService, logger: Logger): Router {
  const router = Router();

  /**
   * GET /printer-assignments/resolve?menuItemId=&categoryId=
   * Which printers an item would be sent to
   */
  router.get('/printer-assignments/resolve', (req: Request, res: Response) => {
    try {
      const parsed = ResolveQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: formatZodError(parsed.error) });
        return;
      }

      const { menuItemId, categoryId } = parsed.data;
      res.json({
        menuItemId,
        categoryId: categoryId ?? null,
        printerIds: resolver.resolveTargets(menuItemId, categoryId ?? null),
        assignments: resolver.getAssignmentsFor(menuItemId, categoryId ?? null),
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to resolve printers';
      logger.error('Error resolving printers', { error: message });
      res.status(500).json({ error: message });
    }
  });

  /**
   * POST /printer-assignments/auto-assign
   * Spread unassigned categories over the active printers
   */
  router.post('/printer-assignments/auto-assign', (req: Request, res: Response) => {
    try {
      const parsed = AutoAssignRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: formatZodError(parsed.error) });
        return;
      }

      const created = resolver.autoAssignCategories(parsed.data.categories);
      res.status(created.length > 0 ? 201 : 200).json({ created });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to auto-assign categories';
      logger.error('Error auto-assigning categories', { error: message });
      res.status(500).json({ error: message });
    }
  });

  router.post('/printer-assignments/reload', (_req: Request, res: Response) => {
    try {
      res.json({ count: resolver.reload() });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Failed to reload assignments';
      logger.error('Error reloading assignments', { error: message });
      res.status(500).json({ error: message });
    }
  });

  return router;
}
