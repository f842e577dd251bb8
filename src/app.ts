import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { APP_CONSTANTS } from './config/constants';
import { Bridge } from './container';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';
import { createConnectionRoutes } from './routes/connection.routes';
import { createInterestRoutes } from './routes/interest.routes';
import { createTelemetryRoutes } from './routes/telemetry.routes';

export interface AppOptions {
  exposeErrors: boolean;
}

export function createApp(bridge: Bridge, options: AppOptions = { exposeErrors: false }) {
  const app = express();
  const prefix = APP_CONSTANTS.API_PREFIX;

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: APP_CONSTANTS.JSON_BODY_LIMIT }));

  app.get(`${prefix}/health`, (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  app.use(`${prefix}/connection`, createConnectionRoutes(bridge));
  app.use(`${prefix}/interest`, createInterestRoutes(bridge));
  app.use(prefix, createTelemetryRoutes(bridge));

  app.use(notFoundHandler);
  app.use(createErrorHandler(options.exposeErrors));

  return app;
}
