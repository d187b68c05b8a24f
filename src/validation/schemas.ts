import { z } from 'zod';
import { clockToMinutes, isClockLabel, isValidTimeZone } from '../utils/timeUtils.js';

const clock = z.string().refine(isClockLabel, { message: 'Expected HH:MM (24h)' });
const points = z.number().finite().nonnegative();
const positiveInt = z.number().int().min(1);

export const EntryModelSchema = z.enum(['unicorn', 'breaker-retap', 'ifvg-flip', 'ob-mean-bounce']);

export const EngineConfigShape = z.object({
  // Swings
  swingLeftStrength: positiveInt.max(20),
  swingRightStrength: positiveInt.max(20),

  // Order blocks
  obMinCandles: positiveInt.max(20),
  obMaxCandles: positiveInt.max(20),
  obBounds: z.enum(['wick', 'body']),

  // Fair value gaps
  fvgMinGap: points,

  // Structural breakers
  breakerSweepLookback: positiveInt.max(500),
  breakerRequireDisplacement: z.boolean(),
  breakerDisplacementPoints: points,
  breakerBufferPoints: points,

  // Balanced ranges
  bprMinWidth: points,
  bprDedupTolerance: points,

  // Zone lifecycle
  zoneMaxAge: positiveInt.max(10_000),
  maxOrderBlocks: positiveInt.max(500),
  maxBreakers: positiveInt.max(500),
  maxFairValueGaps: positiveInt.max(500),
  maxInvertedFvgs: positiveInt.max(500),
  maxBalancedRanges: positiveInt.max(500),

  // Bias
  biasMaPeriod: positiveInt.max(500),
  htfMode: z.enum(['strict', 'loose', 'off']),
  htfMinutes: positiveInt.max(1440),
  requireIntradayAlign: z.boolean(),
  looseCounterTrendModels: z.array(EntryModelSchema),

  // Draw on liquidity
  useSessionLevels: z.boolean(),
  useSwingLevels: z.boolean(),
  useEqualLevels: z.boolean(),
  equalLevelTolerance: points,
  requireDrawTarget: z.boolean(),

  // Entry models
  enableUnicorn: z.boolean(),
  enableBreakerRetap: z.boolean(),
  enableIfvgFlip: z.boolean(),
  enableObMeanBounce: z.boolean(),
  obMeanThreshold: z.boolean(),
  maxWaitBars: positiveInt.max(100),
  confirmOnSignalBar: z.boolean(),
  allowLong: z.boolean(),
  allowShort: z.boolean(),

  // Risk
  contracts: positiveInt.max(1_000),
  tickSize: z.number().finite().positive(),
  stopBufferPoints: points,
  tightStopThreshold: points,
  stopOverrideToStructure: z.boolean(),
  stopDefaultPoints: z.number().finite().positive(),
  stopMinPoints: z.number().finite().positive(),
  stopMaxPoints: z.number().finite().positive(),
  targetMode: z.enum(['fixed-r', 'liquidity', 'hybrid']),
  targetR: z.number().finite().positive(),
  hybridMinR: z.number().finite().positive(),

  // Trade management
  beEnabled: z.boolean(),
  beTriggerPoints: z.number().finite().positive(),
  beOffsetPoints: points,
  partialEnabled: z.boolean(),
  partialR: z.number().finite().positive(),
  partialPct: z.number().finite().gt(0).max(100),
  trailEnabled: z.boolean(),
  trailMode: z.enum(['points', 'atr']),
  trailPoints: z.number().finite().positive(),
  trailAtrMultiple: z.number().finite().positive(),
  atrPeriod: positiveInt.max(500),
  maxBarsInTrade: positiveInt.max(10_000),
  progressCheckBars: z.number().int().min(0).max(10_000),
  progressMinR: z.number().finite(),

  // Session
  timezone: z.string().refine(isValidTimeZone, { message: 'Unknown IANA timezone' }),
  tradeStart: clock,
  tradeEnd: clock,
  forcedFlatEnabled: z.boolean(),
  forcedFlatTime: clock,
  maxTradesPerDay: positiveInt.max(100),
  cooldownMinutes: z.number().int().min(0).max(1440),
  oneTradePerDirection: z.boolean(),
}).strict();

export const EngineConfigSchema = EngineConfigShape.superRefine((cfg, ctx) => {
  if (cfg.stopMinPoints > cfg.stopMaxPoints) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['stopMinPoints'],
      message: `stopMinPoints (${cfg.stopMinPoints}) must not exceed stopMaxPoints (${cfg.stopMaxPoints})`,
    });
  }
  if (cfg.obMinCandles > cfg.obMaxCandles) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['obMinCandles'],
      message: 'obMinCandles must not exceed obMaxCandles',
    });
  }
  if (isClockLabel(cfg.tradeStart) && isClockLabel(cfg.tradeEnd) &&
      clockToMinutes(cfg.tradeStart) >= clockToMinutes(cfg.tradeEnd)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['tradeEnd'],
      message: 'tradeEnd must be after tradeStart',
    });
  }
  if (cfg.forcedFlatEnabled && isClockLabel(cfg.tradeStart) && isClockLabel(cfg.forcedFlatTime) &&
      clockToMinutes(cfg.forcedFlatTime) <= clockToMinutes(cfg.tradeStart)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['forcedFlatTime'],
      message: 'forcedFlatTime must be after tradeStart',
    });
  }
});

export const EngineConfigOverridesSchema = EngineConfigShape.partial();

export const BarSchema = z.object({
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  startTime: z.number().int().nonnegative(),
  complete: z.boolean().optional().default(true),
}).refine(
  bar => bar.high >= Math.max(bar.open, bar.close) && bar.low <= Math.min(bar.open, bar.close),
  { message: 'high/low must bracket open and close' }
);

export const ReplayRequestSchema = z.object({
  config: EngineConfigOverridesSchema.optional(),
  bars: z.array(BarSchema).min(1).max(50_000),
});

export const EnvSchema = z.object({
  PORT: z.coerce.number().min(1).max(65535).optional().default(5000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional().default('info'),
  ENGINE_TIMEZONE: z.string().refine(isValidTimeZone, { message: 'Unknown IANA timezone' })
    .optional().default('America/New_York'),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigOverrides = z.infer<typeof EngineConfigOverridesSchema>;
export type EntryModel = z.infer<typeof EntryModelSchema>;
export type BarInput = z.infer<typeof BarSchema>;
export type ReplayRequest = z.infer<typeof ReplayRequestSchema>;
export type Env = z.infer<typeof EnvSchema>;
