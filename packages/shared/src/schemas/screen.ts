import { z } from 'zod'
import type { PredictionTestOptions } from '@pa-trend/signal-core'

export const screenOptionsSchema = z.object({
  alpha: z.number().gt(0, 'alpha must be > 0').lt(1, 'alpha must be < 1'),
  distribution: z.enum(['t', 'normal']),
}) satisfies z.ZodType<PredictionTestOptions>

export const screenOverridesSchema = screenOptionsSchema.partial().strict()

export type ScreenOverrides = z.infer<typeof screenOverridesSchema>
