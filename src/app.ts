import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import { ZodError } from 'zod';
import { appConfig, isDevelopment } from '@/config';
import apiRoutes from '@/routes';
import { AppError } from '@/utils/errors';
import { logger, expressLogger } from '@/utils/logger';

export const createApp = (): express.Express => {
  const app = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: isDevelopment ? false : {
      directives: {
        defaultSrc: ["'self'"],
        imgSrc: ["'self'", "data:", "blob:"],
        connectSrc: ["'self'"],
      }
    },
    crossOriginResourcePolicy: { policy: 'cross-origin' }
  }));

  // CORS configuration
  app.use(cors({
    origin: appConfig.cors.origin,
    credentials: appConfig.cors.credentials,
    optionsSuccessStatus: 200
  }));

  // Request parsing
  app.use(express.json({ limit: '1mb' }));

  // Compression
  app.use(compression());

  // Request logging
  const morganFormat = isDevelopment ? 'dev' : 'combined';
  app.use(morgan(morganFormat, {
    stream: { write: message => expressLogger.info(message.trim()) }
  }));

  // Trust proxy if configured
  if (appConfig.security.trustProxy) {
    app.set('trust proxy', true);
  }

  app.use(appConfig.basePath, apiRoutes);

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: {
        message: 'Route not found',
        code: 'NOT_FOUND'
      }
    });
  });

  // Global error handler
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ZodError) {
      const issue = err.issues[0];
      const where = issue && issue.path.length ? `${issue.path.join('.')}: ` : '';
      res.status(400).json({
        error: {
          message: `${where}${issue ? issue.message : 'Invalid request'}`,
          code: 'VALIDATION_ERROR'
        }
      });
      return;
    }

    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        logger.error('Request failed:', { error: err.message, code: err.code, url: req.url, method: req.method });
      }
      res.status(err.statusCode).json({
        error: {
          message: err.message,
          code: err.code
        }
      });
      return;
    }

    // express.json() marks malformed bodies with a 400 status
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      res.status(400).json({
        error: {
          message: 'Malformed JSON body',
          code: 'VALIDATION_ERROR'
        }
      });
      return;
    }

    const error = err instanceof Error ? err : new Error(String(err));
    logger.error('Unhandled error:', {
      error: error.message,
      stack: error.stack,
      url: req.url,
      method: req.method
    });

    res.status(500).json({
      error: {
        message: isDevelopment ? error.message : 'Internal server error',
        code: 'INTERNAL_ERROR'
      }
    });
  });

  return app;
};
