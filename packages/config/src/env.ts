/**
 * Environment configuration — fail-fast on startup.
 *
 * Reads PA_TREND_* variables, merges them over the built-in defaults and
 * validates the result. A malformed value throws immediately with the
 * variable name rather than surfacing later as a NaN inside the detector.
 */

import { monitorConfigSchema, formatIssues, type MonitorConfig } from '@pa-trend/shared'
import { InvalidConfigurationError } from '@pa-trend/signal-core'

export type Env = Readonly<Record<string, string | undefined>>

/** Variable names, by the config field they feed. */
export const ENV_KEYS = {
  alphaBaseline: 'PA_TREND_ALPHA_BASELINE',
  alphaVar: 'PA_TREND_ALPHA_VAR',
  delta: 'PA_TREND_DELTA',
  h: 'PA_TREND_THRESHOLD',
  warmup: 'PA_TREND_WARMUP',
  clipZ: 'PA_TREND_CLIP_Z',
  recenterOnAlarm: 'PA_TREND_RECENTER_ON_ALARM',
  screenAlpha: 'PA_TREND_SCREEN_ALPHA',
  screenDistribution: 'PA_TREND_SCREEN_DISTRIBUTION',
  baselineWindow: 'PA_TREND_BASELINE_WINDOW',
  refractory: 'PA_TREND_REFRACTORY',
  quantize: 'PA_TREND_QUANTIZE',
  historySize: 'PA_TREND_HISTORY_SIZE',
  logLevel: 'PA_TREND_LOG_LEVEL',
} as const

function optional(env: Env, key: string): string | undefined {
  const val = env[key]?.trim()
  return val ? val : undefined
}

function readEnvNumber(env: Env, key: string): number | undefined {
  const raw = optional(env, key)
  if (raw === undefined) return undefined
  const val = Number(raw)
  if (!Number.isFinite(val)) {
    throw new InvalidConfigurationError(key, `expected a number, got '${raw}'`)
  }
  return val
}

function readEnvFlag(env: Env, key: string): boolean | undefined {
  const val = optional(env, key)
  if (val === undefined) return undefined
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  throw new InvalidConfigurationError(key, `expected true/false/1/0, got '${val}'`)
}

/** `off` or `none` disables winsorization. */
function readClipZ(env: Env, key: string): number | null | undefined {
  const raw = optional(env, key)
  if (raw === 'off' || raw === 'none') return null
  return readEnvNumber(env, key)
}

function withoutUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined))
}

/**
 * Build the monitor configuration from environment variables.
 * Unset variables fall back to the package defaults.
 *
 * @throws InvalidConfigurationError naming the offending variable or field
 */
export function loadMonitorConfig(env: Env = process.env): MonitorConfig {
  const recenter = readEnvFlag(env, ENV_KEYS.recenterOnAlarm)

  const raw = withoutUndefined({
    drift: withoutUndefined({
      alphaBaseline: readEnvNumber(env, ENV_KEYS.alphaBaseline),
      alphaVar: readEnvNumber(env, ENV_KEYS.alphaVar),
      delta: readEnvNumber(env, ENV_KEYS.delta),
      h: readEnvNumber(env, ENV_KEYS.h),
      warmup: readEnvNumber(env, ENV_KEYS.warmup),
      clipZ: readClipZ(env, ENV_KEYS.clipZ),
      alarmPolicy: recenter === undefined ? undefined : recenter ? 'recenter-baseline' : 'reset-accumulators',
    }),
    screen: withoutUndefined({
      alpha: readEnvNumber(env, ENV_KEYS.screenAlpha),
      distribution: optional(env, ENV_KEYS.screenDistribution),
    }),
    waveform: withoutUndefined({
      refractory: readEnvNumber(env, ENV_KEYS.refractory),
      quantize: optional(env, ENV_KEYS.quantize),
    }),
    baselineWindow: readEnvNumber(env, ENV_KEYS.baselineWindow),
    historySize: readEnvNumber(env, ENV_KEYS.historySize),
    logLevel: optional(env, ENV_KEYS.logLevel),
  })

  const result = monitorConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidConfigurationError('environment', formatIssues(result.error))
  }
  return result.data
}
