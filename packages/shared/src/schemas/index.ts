export {
  alarmPolicySchema,
  driftConfigSchema,
  driftOverridesSchema,
  driftStateSchema,
  type DriftOverrides,
  type DriftStateInput,
} from './drift.js'

export {
  screenOptionsSchema,
  screenOverridesSchema,
  type ScreenOverrides,
} from './screen.js'

export {
  waveformOptionsSchema,
  waveformOverridesSchema,
  waveformPointSchema,
  waveformSchema,
  type WaveformOverrides,
  type WaveformInput,
} from './waveform.js'

export {
  SNAPSHOT_SCHEMA_VERSION,
  logLevelSchema,
  monitorConfigSchema,
  seriesIdSchema,
  monitorSnapshotSchema,
  type LogLevel,
  type MonitorConfig,
  type MonitorConfigInput,
  type MonitorSnapshot,
} from './monitor.js'

export { formatIssues } from './format.js'
