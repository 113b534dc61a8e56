import { z } from 'zod'
import type { WaveformOptions } from '@pa-trend/signal-core'

export const waveformOptionsSchema = z.object({
  refractory: z.number().finite().min(0),
  quantize: z.enum(['round', 'floor']),
}) satisfies z.ZodType<WaveformOptions>

export const waveformOverridesSchema = waveformOptionsSchema.partial().strict()

/** One [pressure, time] sample. */
export const waveformPointSchema = z.tuple([z.number().finite(), z.number().finite()])

/** A session's waveform: samples in non-decreasing time order. */
export const waveformSchema = z.array(waveformPointSchema).superRefine((points, ctx) => {
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1]
    const curr = points[i]
    if (prev && curr && curr[1] < prev[1]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `time must be non-decreasing (index ${i}: ${curr[1]} < ${prev[1]})`,
        path: [i, 1],
      })
    }
  }
})

export type WaveformOverrides = z.infer<typeof waveformOverridesSchema>
export type WaveformInput = z.infer<typeof waveformSchema>
