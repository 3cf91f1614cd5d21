import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import type { Express } from 'express';
import { requestContext } from '../api/middleware/request-context.js';
import { errorHandler, notFoundHandler } from '../api/middleware/error-handler.js';
import { env } from '../config/env.js';
import { logger } from '../lib/logger.js';

/**
 * Build the Express app with the shared middleware stack and the health route.
 *
 * Modules mount their own routers on the returned app during run(); call
 * {@link finalizeExpressApp} afterwards so the 404 and error handlers sit
 * behind every route.
 */
export function createExpressApp(): Express {
  const app = express();

  app.set('trust proxy', true);
  app.use(requestContext);
  app.use(helmet());

  const allowedOrigins = env.CORS_ORIGINS;
  app.use(cors({
    origin: (origin, callback) => {
      // Requests without an Origin header (curl, server-to-server)
      if (!origin) return callback(null, true);

      if (allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('CORS policy: Origin not allowed'));
      }
    },
    credentials: true
  }));

  app.use(compression());
  app.use(express.json({ limit: '2mb' }));

  if (env.NODE_ENV !== 'test') {
    app.use(morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', {
      stream: { write: line => logger.info(line.trim()) }
    }));
  }

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  return app;
}

export function finalizeExpressApp(app: Express): Express {
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
