import express from 'express';
import cors from 'cors';
import type { TokenIssuer, TokenVerifier } from '../../application/auth/tokens.js';
import type { UserStore } from '../../domain/auth/userStore.js';
import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { createHealthRoutes, API_VERSION } from './routes/health.js';
import { createAuthRoutes } from './routes/auth.js';
import { createUserRoutes } from './routes/users.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createHttpLogger } from './middleware/httpLogger.js';
import { createApiRateLimiter, createLoginRateLimiter } from './middleware/rateLimit.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { notFoundHandler } from './middleware/notFound.js';

const API_PREFIX = '/api/v1';

export interface AppDependencies {
  config: Pick<AppConfig, 'corsOrigins' | 'rateLimit' | 'trustProxy'>;
  logger: Logger;
  userStore: UserStore;
  tokenIssuer: TokenIssuer;
  tokenVerifier: TokenVerifier;
}

/**
 * Assemble the Express application. Every collaborator comes in through
 * `deps`; nothing here opens connections or listens.
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const { corsOrigins, rateLimit, trustProxy } = deps.config;

  app.disable('x-powered-by');
  // Behind an ingress every caller would otherwise share the proxy's IP.
  app.set('trust proxy', trustProxy);

  app.use(createHttpLogger(deps.logger));
  app.use(
    cors({
      origin: corsOrigins.length > 0 ? corsOrigins : '*',
      credentials: corsOrigins.length > 0,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'],
      allowedHeaders: ['Origin', 'Content-Type', 'Authorization', 'X-Request-Id'],
      exposedHeaders: ['Content-Length', 'X-Request-Id'],
      maxAge: 12 * 60 * 60,
    })
  );
  app.use(express.json({ limit: '100kb' }));

  // Mounted ahead of the limiter: health checks and the welcome page never see 429.
  app.get('/', (_req, res) => {
    res.json({
      message: 'Welcome to the Users API',
      version: API_VERSION,
      docs: '/docs',
    });
  });
  app.use(API_PREFIX, createHealthRoutes());

  app.use(createApiRateLimiter(rateLimit));

  app.use(createSwaggerRoutes());
  app.use(
    `${API_PREFIX}/auth`,
    createAuthRoutes({
      userStore: deps.userStore,
      tokenIssuer: deps.tokenIssuer,
      loginRateLimiter: createLoginRateLimiter(rateLimit),
    })
  );
  app.use(
    API_PREFIX,
    createUserRoutes({
      userStore: deps.userStore,
      tokenVerifier: deps.tokenVerifier,
    })
  );

  app.use(notFoundHandler);
  // Error handler (must be last)
  app.use(createErrorHandler(deps.logger));

  return app;
}
