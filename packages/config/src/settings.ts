import { z } from 'zod'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/** Numeric floors and logging threshold shared by every leaf summary. */
export interface LeafSummarySettings {
  /** Lower bound on a predicted probability before its log is taken. */
  probabilityFloor: number
  /** Lower bound on any variance (or covariance diagonal) a summary reports. */
  varianceFloor: number
  logLevel: LogLevel
}

export type SettingKey = keyof LeafSummarySettings

/** Environment variable consulted for each setting. */
export const SETTING_ENV_KEYS: Record<SettingKey, string> = {
  probabilityFloor: 'LEAFSTATS_PROBABILITY_FLOOR',
  varianceFloor: 'LEAFSTATS_VARIANCE_FLOOR',
  logLevel: 'LEAFSTATS_LOG_LEVEL',
}

export const DEFAULT_SETTINGS: Readonly<LeafSummarySettings> = Object.freeze({
  probabilityFloor: 1e-6,
  varianceFloor: 1e-6,
  logLevel: 'info',
})

// ─── Schemas ────────────────────────────────────────────────────────────────

const floorSchema = z.coerce.number().finite().positive().max(1)

export const settingsSchema = z.object({
  probabilityFloor: floorSchema,
  varianceFloor: floorSchema,
  logLevel: z.enum(LOG_LEVELS),
})

export type EnvSource = Record<string, string | undefined>

function readEnv(): EnvSource {
  if (typeof process !== 'undefined' && process.env) return process.env
  return {}
}

/** Parse one env value; unset or invalid values yield undefined. */
function parseSetting<T>(schema: z.ZodType<T>, raw: string | undefined): T | undefined {
  if (raw === undefined || raw.trim() === '') return undefined
  const result = schema.safeParse(raw.trim())
  return result.success ? result.data : undefined
}

/** Resolve settings: env override > default. Invalid overrides are ignored. */
export function resolveSettings(env: EnvSource = readEnv()): Readonly<LeafSummarySettings> {
  return Object.freeze({
    probabilityFloor:
      parseSetting(settingsSchema.shape.probabilityFloor, env[SETTING_ENV_KEYS.probabilityFloor]) ??
      DEFAULT_SETTINGS.probabilityFloor,
    varianceFloor:
      parseSetting(settingsSchema.shape.varianceFloor, env[SETTING_ENV_KEYS.varianceFloor]) ??
      DEFAULT_SETTINGS.varianceFloor,
    logLevel:
      parseSetting(settingsSchema.shape.logLevel, env[SETTING_ENV_KEYS.logLevel]) ??
      DEFAULT_SETTINGS.logLevel,
  })
}

/** Settings resolved once at startup; read-only for the process lifetime. */
export const settings: Readonly<LeafSummarySettings> = resolveSettings()
