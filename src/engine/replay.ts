/**
 * Deterministic replay of a bar sequence through a fresh engine.
 */

import type { Bar } from '../modules/smartMoney/types.js';
import type { EngineConfig } from '../validation/schemas.js';
import { createSessionClock, type SessionClock } from '../utils/timeUtils.js';
import { createLogger } from '../services/logger.js';
import { createDecisionEngine, type EngineState } from './decisionEngine.js';
import type { EngineCommand, EngineEvent } from './events.js';

const logger = createLogger('Replay');

export interface ReplayResult {
  events: EngineEvent[];
  commands: EngineCommand[];
  state: EngineState;
  barsProcessed: number;
  barsIgnored: number;
}

export function replayBars(
  bars: readonly Bar[],
  config: EngineConfig,
  clock: SessionClock = createSessionClock(config.timezone)
): ReplayResult {
  const engine = createDecisionEngine(config, clock);
  let state = engine.initialState();
  const events: EngineEvent[] = [];
  const commands: EngineCommand[] = [];
  let barsIgnored = 0;

  for (const bar of bars) {
    const result = engine.processBar(state, bar);
    if (result.state === state) {
      barsIgnored++;
      continue;
    }
    state = result.state;
    events.push(...result.events);
    commands.push(...result.commands);
  }

  const barsProcessed = bars.length - barsIgnored;
  logger.info(`Replayed ${barsProcessed} bars`, {
    ignored: barsIgnored,
    events: events.length,
    entries: events.filter(e => e.kind === 'entry-long' || e.kind === 'entry-short').length,
  });

  return { events, commands, state, barsProcessed, barsIgnored };
}
