import express, { Application } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';

/**
 * Origins listed in CORS_ORIGIN, or any origin when the list holds "*".
 * Requests without an Origin header (curl, server-to-server) are allowed.
 */
const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    const allowed =
      !origin || env.CORS_ORIGIN.includes('*') || env.CORS_ORIGIN.includes(origin);
    callback(null, allowed);
  },
  credentials: true,
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept'],
  exposedHeaders: ['Content-Disposition'],
};

/**
 * Create and configure Express application
 */
export const createApp = (): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(hpp());
  app.use(cors(corsOptions));

  // Rate limiting: every reconciliation parses and matches whole files
  app.use(
    rateLimit({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX_REQUESTS,
      message: {
        success: false,
        error: 'Too many requests, please try again later',
      },
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  // JSON datasets share the upload size limit
  const bodyLimit = `${env.MAX_UPLOAD_SIZE_MB}mb`;
  app.use(express.json({ limit: bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: bodyLimit }));

  app.use(compression());
  app.use(requestLogger);

  // API routes
  app.use(env.API_PREFIX, routes);

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Attendance Reconciliation API',
      version: '1.0.0',
      health: `${env.API_PREFIX}/health`,
      reconcile: `${env.API_PREFIX}/attendance/reconcile`,
      absentees: `${env.API_PREFIX}/attendance/absentees`,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
