export * from './ai'
export {
  loadConfig,
  parseConfig,
  applyEnvOverrides,
  ConfigError,
  DEFAULT_CONFIG_PATH,
  type LoadConfigOptions
} from './config/load-config'
export {
  conductorConfigSchema,
  type ConductorConfig,
  type ConductorConfigInput,
  type ModelConfig,
  type RetryConfig
} from './config/config-schema'
export { openDatabase, closeDatabase } from './db/connection'
export { runMigrations } from './db/migrate'
export { PerformanceRepository, type SubjectSummary } from './db/repositories/performance.repository'
export { SecretsRepository, type SecretListItem } from './db/repositories/secrets.repository'
export { createLogger, setLogLevel, type Logger } from './logger'
