export { applyEnvOverrides, loadSettings, parseSettings } from './settings';
export { loadEnvConfig, readEnvConfig } from './env';
export type {
  Settings,
  PathsConfig,
  LoggingConfig,
  StoreConfig,
  EnvConfig,
  LogLevel,
  LogFormat
} from './types';
