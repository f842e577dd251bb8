import { Request, Response, NextFunction } from 'express';
import { Bridge } from '../container';
import { logger, LogCategory } from '../utils/Logger';

export function createConnectionController(bridge: Bridge) {
  return {
    async connect(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        logger.info(LogCategory.API, 'Connect requested');
        await bridge.lifecycle.connect();
        res.json({ success: true, connectionState: bridge.lifecycle.getState() });
      } catch (error) {
        next(error);
      }
    },

    disconnect(_req: Request, res: Response): void {
      logger.info(LogCategory.API, 'Disconnect requested');
      bridge.lifecycle.disconnect();
      res.json({ success: true, connectionState: bridge.lifecycle.getState() });
    },
  };
}
