export * from './modules/smartMoney/index.js';
export * from './engine/decisionEngine.js';
export * from './engine/entrySelector.js';
export * from './engine/tradeManager.js';
export * from './engine/dailyController.js';
export * from './engine/biasFilter.js';
export * from './engine/zoneArena.js';
export * from './engine/events.js';
export * from './engine/replay.js';
export * from './config/engineConfig.js';
export { DEFAULT_ENGINE_CONFIG } from './config/defaults.js';
export * from './services/executionBridge.js';
export * from './services/paperGateway.js';
export { createSessionClock, type SessionClock } from './utils/timeUtils.js';
export type { EngineConfig, EngineConfigOverrides, EntryModel } from './validation/schemas.js';
