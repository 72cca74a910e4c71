// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler } from './middleware/errorHandler.js';
import { createEncounterRouter } from './routes/encounters.js';
import type { IEncounterRegistry } from '@/infrastructure/encounter/EncounterRegistry.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '@/utils/config.js';
import type { Logger } from '@/utils/logger.js';

export interface AppOptions {
  registry: IEncounterRegistry;
  engineConfig?: EngineConfig;
  engineLogger?: Logger;
  corsOrigins?: string[];
  trustProxy?: boolean;
  /** morgan format; false disables request logging */
  logFormat?: string | false;
}

export function createApp(options: AppOptions): Application {
  const app = express();

  const {
    registry,
    engineConfig = DEFAULT_ENGINE_CONFIG,
    corsOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
  } = options;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API-only server
  }));

  // CORS
  app.use(cors({
    origin: corsOrigins,
    credentials: true,
  }));

  // Logging
  if (logFormat !== false) {
    app.use(morgan(logFormat));
  }

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Health check (before routes)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      activeEncounters: registry.activeCount,
      storedEncounters: registry.size,
    });
  });

  // API routes
  app.use('/api/encounters', createEncounterRouter(registry, {
    engineConfig,
    engineLogger: options.engineLogger,
  }));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
      },
    });
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
