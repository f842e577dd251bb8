import rateLimit from 'express-rate-limit';
import { APP_CONSTANTS } from '../config/constants';

export function createConnectionRateLimiter() {
  return rateLimit({
    windowMs: APP_CONSTANTS.CONNECTION_RATE_LIMIT.windowMs,
    max: APP_CONSTANTS.CONNECTION_RATE_LIMIT.max,
    message: { success: false, error: 'Too many connection requests, please try again later' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
