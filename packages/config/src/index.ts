// Shared configuration: numeric floors and log threshold resolved from the
// environment once at startup, plus the structured logger every package uses.

export {
  settings,
  resolveSettings,
  settingsSchema,
  DEFAULT_SETTINGS,
  SETTING_ENV_KEYS,
  LOG_LEVELS,
  type LeafSummarySettings,
  type SettingKey,
  type LogLevel,
  type EnvSource,
} from './settings'

export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogEntry,
  type LogFields,
  type LogSink,
} from './logger'
