// Shared configuration: environment-driven monitor settings.

export {
  loadMonitorConfig,
  ENV_KEYS,
  type Env,
} from './env.js'
