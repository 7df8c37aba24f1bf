import rateLimit from 'express-rate-limit';
import { appConfig } from '@/config';
import { logger } from '@/utils/logger';

export const createApiRateLimit = (
  windowMs: number = appConfig.rateLimit.windowMs,
  limit: number = appConfig.rateLimit.maxRequests
) => rateLimit({
  windowMs,
  limit,
  message: {
    error: {
      message: 'Too many requests, please try again later',
      code: 'RATE_LIMIT_EXCEEDED'
    }
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => {
    return req.ip || 'unknown';
  },
  handler: (req, res, next, options) => {
    logger.warn('Rate limit exceeded', { ip: req.ip, path: req.path });
    res.status(options.statusCode).json(options.message);
  },
  // Health probes are not counted
  skip: (req) => req.path.startsWith('/health'),
});

export const apiRateLimit = createApiRateLimit();
