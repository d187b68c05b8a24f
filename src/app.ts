/**
 * Zone Engine - HTTP App
 *
 * Endpoints:
 * GET  /api/health            - Health check
 * GET  /api/config/defaults   - Default engine configuration
 * POST /api/replay            - Run bars through a fresh engine and return its events
 */

import express, { type Express } from 'express';
import cors from 'cors';

import { DEFAULT_ENGINE_CONFIG } from './config/defaults.js';
import { EngineConfigError } from './config/engineConfig.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { validateBody } from './middleware/validate.js';
import { runReplay } from './routes/replay.js';
import { ReplayRequestSchema, type Env, type ReplayRequest } from './validation/schemas.js';
import { createLogger } from './services/logger.js';

const logger = createLogger('App');

export const APP_VERSION = '1.0.0';

export function createApp(env: Env): Express {
  const app = express();

  // ═══════════════════════════════════════════════════════════════
  // MIDDLEWARE
  // ═══════════════════════════════════════════════════════════════

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));
  app.use(requestIdMiddleware);

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.debug(`${req.method} ${req.path} ${res.statusCode} ${duration}ms`, { requestId: req.id });
    });
    next();
  });

  // ═══════════════════════════════════════════════════════════════
  // API ROUTES
  // ═══════════════════════════════════════════════════════════════

  /**
   * Health check
   */
  app.get('/api/health', (req, res) => {
    res.json({
      status: 'ok',
      version: APP_VERSION,
      timestamp: new Date().toISOString(),
      timezone: env.ENGINE_TIMEZONE,
    });
  });

  /**
   * Default engine configuration
   */
  app.get('/api/config/defaults', (req, res) => {
    res.json({ ...DEFAULT_ENGINE_CONFIG, timezone: env.ENGINE_TIMEZONE });
  });

  /**
   * Replay bars through a fresh engine
   */
  app.post('/api/replay', validateBody(ReplayRequestSchema), (req, res) => {
    const request: ReplayRequest = req.body;
    try {
      const response = runReplay(request, { timezone: env.ENGINE_TIMEZONE });
      res.json(response);
    } catch (error) {
      if (error instanceof EngineConfigError) {
        res.status(400).json({ error: 'Invalid engine configuration', issues: error.issues });
        return;
      }
      logger.error('Replay failed', {
        requestId: req.id,
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(500).json({ error: 'Replay failed' });
    }
  });

  return app;
}
