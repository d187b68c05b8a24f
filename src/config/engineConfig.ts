/**
 * Engine Configuration Loader
 * Merges caller overrides onto the defaults and rejects anything malformed before bars flow.
 */

import { ZodError } from 'zod';
import { DEFAULT_ENGINE_CONFIG } from './defaults.js';
import {
  EngineConfigOverridesSchema,
  EngineConfigSchema,
  type EngineConfig,
} from '../validation/schemas.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('EngineConfig');

export interface ConfigIssue {
  field: string;
  message: string;
}

export class EngineConfigError extends Error {
  public readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    const summary = issues.map(issue => `${issue.field || '(root)'}: ${issue.message}`).join('; ');
    super(`Invalid engine configuration: ${summary}`);
    this.name = 'EngineConfigError';
    this.issues = issues;
  }
}

function toIssues(error: ZodError): ConfigIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validate overrides and return a complete configuration.
 * @throws EngineConfigError listing every rejected key
 */
export function loadEngineConfig(overrides: unknown = {}): EngineConfig {
  const partial = EngineConfigOverridesSchema.safeParse(overrides);
  if (!partial.success) {
    const issues = toIssues(partial.error);
    logger.warn('Rejected configuration overrides', { issues });
    throw new EngineConfigError(issues);
  }

  const merged = EngineConfigSchema.safeParse({ ...DEFAULT_ENGINE_CONFIG, ...partial.data });
  if (!merged.success) {
    const issues = toIssues(merged.error);
    logger.warn('Rejected merged configuration', { issues });
    throw new EngineConfigError(issues);
  }

  logger.debug('Engine configuration loaded', {
    overrides: Object.keys(partial.data),
    htfMode: merged.data.htfMode,
    targetMode: merged.data.targetMode,
  });
  return merged.data;
}
