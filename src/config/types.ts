export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface PathsConfig {
  data_dir: string;
  db_file: string;
}

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
}

export interface StoreConfig {
  busy_timeout_ms: number;
  default_page_size: number;
  max_page_size: number;
  default_source: string;
}

export interface Settings {
  paths: PathsConfig;
  logging: LoggingConfig;
  store: StoreConfig;
}

export interface EnvConfig {
  dbFile?: string;
  logLevel?: LogLevel;
}
