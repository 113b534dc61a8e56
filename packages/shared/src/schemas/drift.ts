import { z } from 'zod'
import type { DriftConfig, DriftState } from '@pa-trend/signal-core'

export const alarmPolicySchema = z.enum(['reset-accumulators', 'recenter-baseline'])

export const driftConfigSchema = z.object({
  alphaBaseline: z.number().gt(0, 'alphaBaseline must be > 0').lte(1, 'alphaBaseline must be <= 1'),
  alphaVar: z.number().gt(0, 'alphaVar must be > 0').lte(1, 'alphaVar must be <= 1'),
  delta: z.number().finite().min(0),
  h: z.number().finite().positive(),
  warmup: z.number().int().min(0),
  clipZ: z.number().finite().positive().nullable(),
  varianceFloor: z.number().finite().positive(),
  initialVariance: z.number().finite().positive(),
  alarmPolicy: alarmPolicySchema,
}) satisfies z.ZodType<DriftConfig>

/** Overrides merged over the detector defaults. */
export const driftOverridesSchema = driftConfigSchema.partial().strict()

/** Checkpointed (μ, σ², S⁺, S⁻) of one series. */
export const driftStateSchema = z.object({
  mu: z.number().finite(),
  variance: z.number().finite().positive(),
  sPlus: z.number().finite().min(0),
  sMinus: z.number().finite().min(0),
  index: z.number().int().min(0),
}) satisfies z.ZodType<DriftState>

export type DriftOverrides = z.infer<typeof driftOverridesSchema>
export type DriftStateInput = z.infer<typeof driftStateSchema>
