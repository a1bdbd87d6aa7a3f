import express, { Router } from 'express';
import pinoHttp from 'pino-http';
import { randomUUID } from 'crypto';
import type { MenuBarController } from './controller';
import { logger } from './logger';
import { errorHandler } from './middleware/errorHandler';
import { createControlRouter } from './routes/control';
import { healthRouter } from './routes/health';

export const buildApp = (controller: MenuBarController) => {
  const app = express();

  app.use(express.json({ limit: '16kb' }));
  app.use((req, res, next) => {
    const headerId = req.get('X-Request-Id');
    const requestId = headerId && headerId.trim().length > 0 ? headerId.trim() : randomUUID();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    next();
  });
  app.use(
    pinoHttp({
      logger,
      genReqId: (_req, res) => res.getHeader('X-Request-Id')?.toString() ?? randomUUID(),
      customLogLevel: (_, res, err) => {
        if (res.statusCode >= 500 || err) return 'error';
        if (res.statusCode >= 400) return 'warn';
        return 'info';
      }
    })
  );

  const apiRouter = Router();
  apiRouter.use('/', healthRouter);
  apiRouter.use('/', createControlRouter(controller));

  app.use('/api', apiRouter);

  app.use(errorHandler);

  return app;
};
