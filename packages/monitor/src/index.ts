// Per-series monitoring pipeline: screen, detect, checkpoint.

export { createLogger, type Logger, type LoggerOptions, type LogFields, type LogSink } from './logger.js'
export {
  SeriesMonitor,
  parseWaveform,
  type IngestResult,
  type SeriesMonitorOptions,
} from './series-monitor.js'
export { MonitorRegistry, type MonitorRegistryOptions } from './registry.js'
