import { z } from 'zod'
import { driftOverridesSchema, driftStateSchema } from './drift.js'
import { screenOverridesSchema } from './screen.js'
import { waveformOverridesSchema } from './waveform.js'

/** Bumped whenever the snapshot layout changes. */
export const SNAPSHOT_SCHEMA_VERSION = 1

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])

export const monitorConfigSchema = z.object({
  drift: driftOverridesSchema.default({}),
  screen: screenOverridesSchema.default({}),
  waveform: waveformOverridesSchema.default({}),
  /** Screen against the last N accepted values; null = the whole series */
  baselineWindow: z.number().int().min(2).nullable().default(null),
  /** Recent drift steps kept in memory per series; 0 disables */
  historySize: z.number().int().min(0).default(0),
  logLevel: logLevelSchema.default('info'),
})

export const seriesIdSchema = z.string().min(1, 'Series ID is required').max(200)

export const monitorSnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_SCHEMA_VERSION),
    seriesId: seriesIdSchema,
    config: monitorConfigSchema,
    series: z.array(z.number().finite()),
    state: driftStateSchema.nullable(),
    alarms: z.array(z.number().int().min(0)),
  })
  .superRefine((snapshot, ctx) => {
    const expected = snapshot.series.length
    const actual = snapshot.state?.index ?? 0
    if (actual !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `state has folded in ${actual} samples but the series holds ${expected}`,
        path: ['state'],
      })
    }
    if (snapshot.alarms.some(i => i >= expected)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'alarm index outside the series',
        path: ['alarms'],
      })
    }
  })

export type LogLevel = z.infer<typeof logLevelSchema>
export type MonitorConfig = z.infer<typeof monitorConfigSchema>
export type MonitorConfigInput = z.input<typeof monitorConfigSchema>
export type MonitorSnapshot = z.infer<typeof monitorSnapshotSchema>
