/**
 * Express application wiring
 */

import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { AppConfig } from './types/config';
import { CompletionProvider } from './lib/chat/provider';
import { ErrorResponseBody } from './types/chat';
import { createChatHandler } from './chatApi';
import { createHealthHandler } from './healthApi';
import { modelsApi } from './modelsApi';
import { createStaticHandler, STATIC_PREFIX } from './webServer';
import * as logger from './lib/utils/logger';

export interface AppDependencies {
  config: AppConfig;
  /** null when no OpenAI key is configured */
  provider: CompletionProvider | null;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to error middleware
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function hasStatus(error: unknown): error is { status: number; type?: string } {
  return typeof error === 'object' && error !== null && 'status' in error
    && typeof error.status === 'number';
}

export function createApp({ config, provider }: AppDependencies): express.Express {
  const app = express();

  app.disable('x-powered-by');

  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );
  app.use(express.json({ limit: '1mb' }));

  app.post('/chat', asyncRoute(createChatHandler({ provider })));
  app.get('/health', createHealthHandler({ providerConfigured: provider !== null }));
  app.get('/models', modelsApi);

  const serveIndex = createStaticHandler(config.staticDir);
  const serveStatic = createStaticHandler(config.staticDir, STATIC_PREFIX);
  app.get('/', serveIndex);
  app.get(`${STATIC_PREFIX}/*`, serveStatic);

  // Body parser failures (malformed JSON, oversized body) are client errors
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (hasStatus(error) && error.status >= 400 && error.status < 500) {
      logger.warn('Malformed request body', { status: error.status, type: error.type });
      const body: ErrorResponseBody = { error: 'Malformed request body', code: 'invalid_request' };
      res.status(error.status).json(body);
      return;
    }
    next(error);
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.logError('Unhandled request error', error, { path: req.path, method: req.method });

    if (res.headersSent) {
      res.end();
      return;
    }
    const body: ErrorResponseBody = { error: 'Internal server error', code: 'internal_error' };
    res.status(500).json(body);
  });

  return app;
}
