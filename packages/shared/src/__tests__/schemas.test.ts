import { describe, it, expect } from 'vitest'
import {
  driftOverridesSchema,
  driftStateSchema,
  screenOverridesSchema,
  waveformOverridesSchema,
  waveformSchema,
  monitorConfigSchema,
  monitorSnapshotSchema,
  SNAPSHOT_SCHEMA_VERSION,
} from '../schemas/index.js'

// ─── Drift Schemas ──────────────────────────────────────────────────────────

describe('driftOverridesSchema', () => {
  it('accepts an empty override set', () => {
    expect(driftOverridesSchema.safeParse({}).success).toBe(true)
  })

  it('accepts valid overrides', () => {
    const result = driftOverridesSchema.safeParse({
      alphaBaseline: 0.02,
      warmup: 50,
      clipZ: null,
      alarmPolicy: 'recenter-baseline',
    })
    expect(result.success).toBe(true)
  })

  it('rejects a zero decay rate', () => {
    expect(driftOverridesSchema.safeParse({ alphaBaseline: 0 }).success).toBe(false)
  })

  it('rejects a fractional warmup', () => {
    expect(driftOverridesSchema.safeParse({ warmup: 10.5 }).success).toBe(false)
  })

  it('rejects an unknown alarm policy', () => {
    expect(driftOverridesSchema.safeParse({ alarmPolicy: 'ignore' }).success).toBe(false)
  })

  it('rejects unknown keys', () => {
    expect(driftOverridesSchema.safeParse({ threshold: 5 }).success).toBe(false)
  })
})

describe('driftStateSchema', () => {
  it('accepts a checkpointed state', () => {
    const result = driftStateSchema.safeParse({ mu: 1.2, variance: 0.01, sPlus: 0, sMinus: 3.1, index: 42 })
    expect(result.success).toBe(true)
  })

  it('rejects negative accumulators', () => {
    const result = driftStateSchema.safeParse({ mu: 1.2, variance: 0.01, sPlus: -1, sMinus: 0, index: 1 })
    expect(result.success).toBe(false)
  })

  it('rejects a zero variance', () => {
    const result = driftStateSchema.safeParse({ mu: 1.2, variance: 0, sPlus: 0, sMinus: 0, index: 1 })
    expect(result.success).toBe(false)
  })
})

// ─── Screen & Waveform Schemas ──────────────────────────────────────────────

describe('screenOverridesSchema', () => {
  it('accepts alpha in (0, 1)', () => {
    expect(screenOverridesSchema.safeParse({ alpha: 0.05, distribution: 'normal' }).success).toBe(true)
  })

  it('rejects alpha = 1', () => {
    expect(screenOverridesSchema.safeParse({ alpha: 1 }).success).toBe(false)
  })
})

describe('waveformOverridesSchema', () => {
  it('accepts floor quantization', () => {
    expect(waveformOverridesSchema.safeParse({ quantize: 'floor', refractory: 0.2 }).success).toBe(true)
  })

  it('rejects other quantize modes', () => {
    expect(waveformOverridesSchema.safeParse({ quantize: 'ceil' }).success).toBe(false)
  })
})

describe('waveformSchema', () => {
  it('accepts time-ordered samples', () => {
    const result = waveformSchema.safeParse([[10.2, 0], [20.5, 0.2], [10.8, 0.2]])
    expect(result.success).toBe(true)
  })

  it('rejects samples that go back in time', () => {
    const result = waveformSchema.safeParse([[10.2, 0], [20.5, 0.2], [10.8, 0.1]])
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual([2, 1])
    }
  })

  it('rejects malformed pairs', () => {
    expect(waveformSchema.safeParse([[10.2]]).success).toBe(false)
    expect(waveformSchema.safeParse([[10.2, null]]).success).toBe(false)
  })
})

// ─── Monitor Schemas ────────────────────────────────────────────────────────

describe('monitorConfigSchema', () => {
  it('fills defaults', () => {
    const result = monitorConfigSchema.parse({})
    expect(result).toEqual({
      drift: {},
      screen: {},
      waveform: {},
      baselineWindow: null,
      historySize: 0,
      logLevel: 'info',
    })
  })

  it('rejects a baseline window below 2', () => {
    expect(monitorConfigSchema.safeParse({ baselineWindow: 1 }).success).toBe(false)
  })
})

describe('monitorSnapshotSchema', () => {
  const base = {
    version: SNAPSHOT_SCHEMA_VERSION,
    seriesId: 'patient-001',
    config: {},
    series: [0.41, 0.43],
    state: { mu: 0.42, variance: 0.001, sPlus: 0, sMinus: 0, index: 2 },
    alarms: [],
  }

  it('accepts a consistent snapshot', () => {
    expect(monitorSnapshotSchema.safeParse(base).success).toBe(true)
  })

  it('accepts an empty series without state', () => {
    expect(monitorSnapshotSchema.safeParse({ ...base, series: [], state: null }).success).toBe(true)
  })

  it('rejects a state that does not match the series length', () => {
    const result = monitorSnapshotSchema.safeParse({ ...base, series: [0.41] })
    expect(result.success).toBe(false)
  })

  it('rejects alarms past the end of the series', () => {
    expect(monitorSnapshotSchema.safeParse({ ...base, alarms: [2] }).success).toBe(false)
  })

  it('rejects an unknown version', () => {
    expect(monitorSnapshotSchema.safeParse({ ...base, version: 2 }).success).toBe(false)
  })
})
