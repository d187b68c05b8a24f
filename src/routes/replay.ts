/**
 * Replay route logic, kept apart from express so it can be exercised directly.
 */

import { loadEngineConfig } from '../config/engineConfig.js';
import { replayBars } from '../engine/replay.js';
import type { EngineCommand, EngineEvent } from '../engine/events.js';
import type { Trade } from '../engine/tradeManager.js';
import type { EngineConfig, EngineConfigOverrides, ReplayRequest } from '../validation/schemas.js';

export interface ReplaySummary {
  barsProcessed: number;
  barsIgnored: number;
  entries: number;
  exits: number;
  openTrade: Trade | null;
  tradesToday: number;
}

export interface ReplayResponse {
  config: EngineConfig;
  summary: ReplaySummary;
  events: EngineEvent[];
  commands: EngineCommand[];
}

/**
 * Run a request's bars through a fresh engine.
 * @param baseOverrides server-level settings the request's own config is layered on
 * @throws EngineConfigError when the merged configuration is rejected
 */
export function runReplay(request: ReplayRequest, baseOverrides: EngineConfigOverrides = {}): ReplayResponse {
  const config = loadEngineConfig({ ...baseOverrides, ...request.config });
  const result = replayBars(request.bars, config);

  return {
    config,
    summary: {
      barsProcessed: result.barsProcessed,
      barsIgnored: result.barsIgnored,
      entries: result.events.filter(e => e.kind === 'entry-long' || e.kind === 'entry-short').length,
      exits: result.events.filter(e => e.kind === 'exit').length,
      openTrade: result.state.trade,
      tradesToday: result.state.daily.tradesToday,
    },
    events: result.events,
    commands: result.commands,
  };
}
