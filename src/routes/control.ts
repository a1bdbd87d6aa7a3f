import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { MenuBarController } from '../controller';
import { HttpError } from '../errors';
import { logger } from '../logger';
import { asyncHandler } from '../middleware/asyncHandler';
import type { PunchAction } from '../site/contract';
import { parseWithSchema } from '../utils/validation';

const setupSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().trim().min(1)
});

export interface ControlHandlers {
  getMenu: RequestHandler;
  clockIn: RequestHandler;
  clockOut: RequestHandler;
  checkStatus: RequestHandler;
  setup: RequestHandler;
  restartSession: RequestHandler;
  quit: RequestHandler;
}

export const createControlHandlers = (controller: MenuBarController): ControlHandlers => {
  const clock = (action: PunchAction): RequestHandler => async (_req, res) => {
    const outcome = await controller.clock(action);
    if (outcome.kind === 'not_configured') {
      throw HttpError.conflict('Please complete setup first');
    }
    res.json({ outcome, menu: controller.menuState() });
  };

  return {
    getMenu: (_req, res) => {
      res.json({ configured: controller.configured, menu: controller.menuState() });
    },

    clockIn: clock('in'),
    clockOut: clock('out'),

    checkStatus: async (_req, res) => {
      const result = await controller.checkStatus();
      if (!result.ok) {
        if (result.reason === 'not_configured') {
          throw HttpError.conflict(result.message);
        }
        throw HttpError.unavailable(result.message, { reason: result.reason });
      }
      res.json({ status: result.status, menu: controller.menuState() });
    },

    setup: async (req, res) => {
      const body = parseWithSchema(setupSchema, req.body, 'Invalid credentials');
      const result = await controller.setup(body);
      if (result.kind === 'complete') {
        res.json({ status: result.status, menu: controller.menuState() });
        return;
      }
      if (result.kind === 'failed') {
        throw HttpError.unavailable(result.message);
      }
      throw HttpError.badRequest(result.kind === 'invalid' ? result.message : 'Setup cancelled');
    },

    restartSession: async (_req, res) => {
      const restarted = await controller.restartSession();
      if (!restarted) {
        throw HttpError.unavailable('Failed to restart browser session');
      }
      res.json({ restarted, menu: controller.menuState() });
    },

    quit: (_req, res) => {
      res.once('finish', () => {
        controller.quit().catch((error: unknown) => {
          logger.error({ err: error }, 'Quit failed');
        });
      });
      res.status(202).json({ quitting: true });
    }
  };
};

export const createControlRouter = (controller: MenuBarController) => {
  const handlers = createControlHandlers(controller);
  const router = Router();

  router.get('/menu', handlers.getMenu);
  router.post('/clock-in', asyncHandler(handlers.clockIn));
  router.post('/clock-out', asyncHandler(handlers.clockOut));
  router.post('/status/check', asyncHandler(handlers.checkStatus));
  router.post('/setup', asyncHandler(handlers.setup));
  router.post('/session/restart', asyncHandler(handlers.restartSession));
  router.post('/quit', handlers.quit);

  return router;
};
