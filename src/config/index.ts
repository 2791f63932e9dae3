import { parseBoolean, parseLogLevel } from './env-parsers.js';
import type { LoggingConfig } from './types.js';

const logging: LoggingConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL),
  enabled: parseBoolean(process.env.ENABLE_LOGGING, true),
};

export const config = Object.freeze({
  logging: Object.freeze(logging),
});
