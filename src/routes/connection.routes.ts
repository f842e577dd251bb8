import { Router } from 'express';
import { Bridge } from '../container';
import { createConnectionController } from '../controllers/connection.controller';
import { createConnectionRateLimiter } from '../middleware/rateLimiter';

export function createConnectionRoutes(bridge: Bridge): Router {
  const router = Router();
  const controller = createConnectionController(bridge);
  const limiter = createConnectionRateLimiter();

  router.post('/connect', limiter, controller.connect);
  router.post('/disconnect', limiter, controller.disconnect);

  return router;
}
