/**
 * Zone Engine - API Server entry point
 */

import 'dotenv/config';

import { createApp, APP_VERSION } from './app.js';
import { EnvSchema } from './validation/schemas.js';
import { toValidationIssues } from './middleware/validate.js';
import { logger } from './services/logger.js';

const parsedEnv = EnvSchema.safeParse(process.env);

if (!parsedEnv.success) {
  logger.error('Invalid environment', { issues: toValidationIssues(parsedEnv.error) });
  process.exit(1);
}

const env = parsedEnv.data;
logger.setLevel(env.LOG_LEVEL);

const app = createApp(env);

const server = app.listen(env.PORT, () => {
  logger.info(`Zone Engine v${APP_VERSION}`);
  logger.info(`Server running on port ${env.PORT}`);
  logger.info(`Session timezone: ${env.ENGINE_TIMEZONE}`);
});

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('Shutting down...');
  server.close(() => process.exit(0));
});
