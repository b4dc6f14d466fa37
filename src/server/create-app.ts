import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import crypto from 'node:crypto';
import { CORS_ALLOWLIST, IS_PRODUCTION, RATE_LIMIT_MAX_REQUESTS, RATE_LIMIT_WINDOW_MS } from './runtime.js';

export interface WxServerSettings {
  isProduction: boolean;
  /** Browser origins allowed to read reports; empty allows every origin outside production. */
  corsAllowlist: string[];
  rateLimitWindowMs: number;
  /** Report requests per window and client; health checks are not counted. */
  rateLimitMaxRequests: number;
}

export const SERVER_SETTINGS: Readonly<WxServerSettings> = {
  isProduction: IS_PRODUCTION,
  corsAllowlist: CORS_ALLOWLIST,
  rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
  rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
};

export const REPORT_PATHS = ['/api/metar', '/api/taf'];

const isAllowedOrigin = (origin: string | undefined, { corsAllowlist, isProduction }: WxServerSettings): boolean => {
  if (!origin) {
    return true;
  }
  return corsAllowlist.length === 0 ? !isProduction : corsAllowlist.includes(origin);
};

export const createApp = (overrides: Partial<WxServerSettings> = {}): Express => {
  const settings: WxServerSettings = { ...SERVER_SETTINGS, ...overrides };
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 1);
  app.use(cors({ methods: ['GET'], origin: (origin, callback) => callback(null, isAllowedOrigin(origin, settings)) }));
  app.use(compression());
  app.use(helmet());

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    res.on('finish', () => {
      if (!settings.isProduction || res.statusCode >= 500) {
        console.log(`[${requestId}] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
      }
    });
    next();
  });

  // Reports describe the weather right now.
  app.use(REPORT_PATHS, (_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Cache-Control', 'no-store');
    next();
  });

  app.use(
    REPORT_PATHS,
    rateLimit({
      windowMs: settings.rateLimitWindowMs,
      limit: settings.rateLimitMaxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many report requests. Please retry later.' },
    }),
  );

  return app;
};
