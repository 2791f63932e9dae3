export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMetadata = Record<string, unknown>;

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly enabled: boolean;
}
