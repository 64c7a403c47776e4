/* config.ts — Protocol constants + zod-validated simulation configuration */

import { z } from 'zod';
import { InvalidConfigError } from './errors';

// ── Protocol defaults ────────────────────────────────────────

export const DEFAULT_NODE_COUNT = 10;
export const DEFAULT_SPACING = 10;              // node i sits at (10i, 10i)
export const DEFAULT_INITIAL_ENERGY = 100.0;    // J
export const DEFAULT_CLUSTER_HEAD_PROBABILITY = 0.2;
export const DEFAULT_ELIGIBILITY_FLOOR = 10.0;
export const DEFAULT_DEATH_FLOOR = 5.0;
export const DEFAULT_BASE_POWER = 1.0;

/** Sim-time units between scheduled actions */
export const DEFAULT_INTERVALS = {
  round: 20,
  failureCheck: 10,
  report: 50,
  summary: 100,
  intra: 1,
  inter: 5,
} as const;

/** Log only every Nth head → sink transmission */
export const DEFAULT_INTER_LOG_EVERY = 5;

/** Report a node again once it has dropped this fraction since its last report */
export const DEFAULT_REPORT_DROP_FRACTION = 0.05;

/** Nodes below this remaining energy get a low-energy notice */
export const DEFAULT_LOW_ENERGY_LOG_THRESHOLD = 10.0;

/** Wi-Fi radio currents used by the delegated energy model */
export const DEFAULT_RADIO = {
  txCurrentA: 0.017,
  rxCurrentA: 0.019,
  supplyVoltageV: 3.0,
  txDurationS: 1,
} as const;

export const MAX_EVENTS = 500;

// ── Schema ───────────────────────────────────────────────────

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().min(0);

export const intervalsSchema = z.object({
  round: positive.default(DEFAULT_INTERVALS.round),
  failureCheck: positive.default(DEFAULT_INTERVALS.failureCheck),
  report: positive.default(DEFAULT_INTERVALS.report),
  summary: positive.default(DEFAULT_INTERVALS.summary),
  intra: positive.default(DEFAULT_INTERVALS.intra),
  inter: positive.default(DEFAULT_INTERVALS.inter),
});

export const radioSchema = z.object({
  txCurrentA: positive.default(DEFAULT_RADIO.txCurrentA),
  rxCurrentA: positive.default(DEFAULT_RADIO.rxCurrentA),
  supplyVoltageV: positive.default(DEFAULT_RADIO.supplyVoltageV),
  txDurationS: positive.default(DEFAULT_RADIO.txDurationS),
});

export const simConfigSchema = z
  .object({
    nodeCount: z.number().int().min(1).max(1000).default(DEFAULT_NODE_COUNT),
    spacing: positive.default(DEFAULT_SPACING),
    sink: z.object({ x: z.number().finite(), y: z.number().finite() }).default({ x: 0, y: 0 }),
    initialEnergy: positive.default(DEFAULT_INITIAL_ENERGY),
    clusterHeadProbability: z.number().min(0).max(1).default(DEFAULT_CLUSTER_HEAD_PROBABILITY),
    eligibilityFloor: nonNegative.default(DEFAULT_ELIGIBILITY_FLOOR),
    deathFloor: nonNegative.default(DEFAULT_DEATH_FLOOR),
    basePower: positive.default(DEFAULT_BASE_POWER),
    dmsProfile: z.enum(['distance', 'priority']).default('distance'),
    highPriorityEvery: z.number().int().min(1).default(5),
    energyModel: z.enum(['manual', 'radio']).default('manual'),
    radio: radioSchema.default({}),
    backupOrdering: z.enum(['after-formation', 'at-election']).default('after-formation'),
    promoteBackupOnHeadDeath: z.boolean().default(false),
    intervals: intervalsSchema.default({}),
    interLogEvery: z.number().int().min(1).default(DEFAULT_INTER_LOG_EVERY),
    reportDropFraction: z.number().min(0).max(1).default(DEFAULT_REPORT_DROP_FRACTION),
    lowEnergyLogThreshold: nonNegative.default(DEFAULT_LOW_ENERGY_LOG_THRESHOLD),
    seed: z.number().int().default(1),
    maxEvents: z.number().int().min(1).default(MAX_EVENTS),
  })
  .refine(c => c.deathFloor < c.eligibilityFloor, {
    message: 'deathFloor must be strictly below eligibilityFloor',
    path: ['deathFloor'],
  });

export type SimConfig = z.infer<typeof simConfigSchema>;
export type SimConfigInput = z.input<typeof simConfigSchema>;

/**
 * Validate overrides and fill every missing field with its default.
 * Throws InvalidConfigError with the zod issues on failure.
 */
export function resolveConfig(overrides: unknown = {}): SimConfig {
  const result = simConfigSchema.safeParse(overrides);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
    throw new InvalidConfigError(`Invalid simulation config — ${where}${first?.message ?? 'unknown error'}`, result.error.issues);
  }
  return result.data;
}

// ── Environment ──────────────────────────────────────────────

const envSchema = z.object({
  LEACH_NODE_COUNT: z.coerce.number().int().optional(),
  LEACH_PROBABILITY: z.coerce.number().optional(),
  LEACH_INITIAL_ENERGY: z.coerce.number().optional(),
  LEACH_DMS_PROFILE: z.enum(['distance', 'priority']).optional(),
  LEACH_ENERGY_MODEL: z.enum(['manual', 'radio']).optional(),
  LEACH_SEED: z.coerce.number().int().optional(),
  LEACH_PROMOTE_BACKUP: z.enum(['true', 'false']).optional(),
});

/** Build a SimConfig from LEACH_* environment variables */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv): SimConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigError('Invalid LEACH_* environment variables', parsed.error.issues);
  }
  const e = parsed.data;
  return resolveConfig({
    nodeCount: e.LEACH_NODE_COUNT,
    clusterHeadProbability: e.LEACH_PROBABILITY,
    initialEnergy: e.LEACH_INITIAL_ENERGY,
    dmsProfile: e.LEACH_DMS_PROFILE,
    energyModel: e.LEACH_ENERGY_MODEL,
    seed: e.LEACH_SEED,
    promoteBackupOnHeadDeath: e.LEACH_PROMOTE_BACKUP === undefined ? undefined : e.LEACH_PROMOTE_BACKUP === 'true',
  });
}

export const serverConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(9755),
  /** Wall-clock milliseconds per sim time unit */
  TICK_INTERVAL_MS: z.coerce.number().int().min(1).default(100),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;
