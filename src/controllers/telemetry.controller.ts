import { Request, Response, NextFunction } from 'express';
import { Bridge } from '../container';
import { AppError } from '../middleware/errorHandler';
import { parseRequest } from '../middleware/validateRequest';
import { resetStatsSchema, setCatalogEnabledSchema, setUnitsSchema } from '../schemas/bridge.schema';

export function createTelemetryController(bridge: Bridge) {
  return {
    getState(_req: Request, res: Response): void {
      res.json({ success: true, state: bridge.store.getState() });
    },

    resetStats(req: Request, res: Response, next: NextFunction): void {
      const { body } = parseRequest(resetStatsSchema, req);
      if (body.parameterId === undefined) {
        bridge.lifecycle.resetAllStats();
      } else if (!bridge.lifecycle.resetStats(body.parameterId)) {
        next(new AppError(`No statistics recorded for ${body.parameterId}`, 404));
        return;
      }
      res.json({ success: true, stats: bridge.store.getState().stats });
    },

    setUnits(req: Request, res: Response): void {
      const { body } = parseRequest(setUnitsSchema, req);
      bridge.lifecycle.setUnits(body.units);
      res.json({ success: true, units: bridge.store.getState().units });
    },

    getCatalog(_req: Request, res: Response): void {
      const units = bridge.store.getState().units;
      const pids = bridge.selection.pids.map(({ definition, enabled }) => ({
        id: definition.id,
        label: definition.label,
        name: definition.name,
        kind: definition.kind,
        enabled,
        unitLabel: bridge.catalog.unitLabel(definition.id, units),
        typicalRange: bridge.catalog.typicalRange(definition.id, units) ?? null,
        gaugeRange: bridge.catalog.combinedRange(definition.id, units) ?? null,
      }));
      res.json({ success: true, pids });
    },

    setCatalogEnabled(req: Request, res: Response, next: NextFunction): void {
      const { params, body } = parseRequest(setCatalogEnabledSchema, req);
      if (!bridge.selection.setEnabled(body.enabled, params.parameterId)) {
        next(new AppError(`Unknown catalog parameter ${params.parameterId}`, 404));
        return;
      }
      res.json({ success: true, parameterId: params.parameterId, enabled: body.enabled });
    },

    getDebugLog(_req: Request, res: Response): void {
      res.type('text/plain').send(bridge.events.exportLogsAsText());
    },
  };
}
