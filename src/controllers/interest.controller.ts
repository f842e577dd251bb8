import { Request, Response, NextFunction } from 'express';
import { APP_CONSTANTS } from '../config/constants';
import { Bridge } from '../container';
import { AppError } from '../middleware/errorHandler';
import { parseRequest } from '../middleware/validateRequest';
import { clearInterestSchema, replaceInterestSchema } from '../schemas/bridge.schema';

export function createInterestController(bridge: Bridge) {
  return {
    createToken(_req: Request, res: Response): void {
      res.status(201).json({ success: true, token: bridge.registry.makeToken() });
    },

    /**
     * Tokens are never expired, so a client that goes away without DELETE keeps
     * its interest. New tokens are refused once MAX_INTEREST_TOKENS are live.
     */
    replaceInterest(req: Request, res: Response, next: NextFunction): void {
      const { params, body } = parseRequest(replaceInterestSchema, req);
      const isNewToken = bridge.registry.getParameters(params.token) === undefined;
      if (isNewToken && body.parameters.length > 0 && bridge.registry.tokenCount >= APP_CONSTANTS.MAX_INTEREST_TOKENS) {
        next(new AppError('Too many live interest tokens', 429));
        return;
      }
      bridge.registry.replace(body.parameters, params.token);
      res.json({
        success: true,
        token: params.token,
        parameters: [...(bridge.registry.getParameters(params.token) ?? [])].sort(),
        interested: [...bridge.registry.getInterested()].sort(),
      });
    },

    clearInterest(req: Request, res: Response): void {
      const { params } = parseRequest(clearInterestSchema, req);
      bridge.registry.clear(params.token);
      res.status(202).json({ success: true, message: 'Interest clear scheduled' });
    },
  };
}
