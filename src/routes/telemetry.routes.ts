import { Router } from 'express';
import { Bridge } from '../container';
import { createTelemetryController } from '../controllers/telemetry.controller';
import { validateRequest } from '../middleware/validateRequest';
import { resetStatsSchema, setCatalogEnabledSchema, setUnitsSchema } from '../schemas/bridge.schema';

export function createTelemetryRoutes(bridge: Bridge): Router {
  const router = Router();
  const controller = createTelemetryController(bridge);

  router.get('/state', controller.getState);
  router.post('/stats/reset', validateRequest(resetStatsSchema), controller.resetStats);
  router.put('/settings/units', validateRequest(setUnitsSchema), controller.setUnits);
  router.get('/catalog', controller.getCatalog);
  router.patch('/catalog/:parameterId', validateRequest(setCatalogEnabledSchema), controller.setCatalogEnabled);
  router.get('/debug/log', controller.getDebugLog);

  return router;
}
