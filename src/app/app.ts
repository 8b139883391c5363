import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Logger } from 'winston';
import type { ServiceContainer } from './service-container';
import { createKitchenDispatchRouter } from './kitchen-dispatch.routes';
import { createPrinterAssignmentRouter } from './printer-assignment.routes';

export interface AppOptions {
  corsOrigins: string[] | true;
}

export function createApp(services: ServiceContainer, logger: Logger, options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: options.corsOrigins }));
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      assignmentsLoaded: services.resolver.isInitialized(),
      pendingJobs: services.retryQueue.size(),
      relay: services.relay ? services.relay.session.getSnapshot() : null,
    });
  });

  app.use('/api', createKitchenDispatchRouter(services, logger));
  app.use('/api', createPrinterAssignmentRouter(services.resolver, logger));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Malformed JSON bodies and anything a handler let through
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = error instanceof Error ? error.message : 'Internal server error';
    const status = error instanceof SyntaxError ? 400 : 500;
    logger.error('Unhandled request error', { error: message, status });
    res.status(status).json({ error: message });
  });

  return app;
}
