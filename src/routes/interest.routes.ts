import { Router } from 'express';
import { Bridge } from '../container';
import { createInterestController } from '../controllers/interest.controller';
import { validateRequest } from '../middleware/validateRequest';
import { clearInterestSchema, replaceInterestSchema } from '../schemas/bridge.schema';

export function createInterestRoutes(bridge: Bridge): Router {
  const router = Router();
  const controller = createInterestController(bridge);

  router.post('/tokens', controller.createToken);
  router.put('/tokens/:token', validateRequest(replaceInterestSchema), controller.replaceInterest);
  router.delete('/tokens/:token', validateRequest(clearInterestSchema), controller.clearInterest);

  return router;
}
