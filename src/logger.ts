import { pino, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
}

// Library default: quiet unless the caller opts in.
const defaultConfig: LoggerConfig = {
  level: 'silent',
  name: 'pg-querybook',
};

export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  return pino(options);
};

export const createChildLogger = (parent: Logger, context: Record<string, unknown>): Logger => {
  return parent.child(context);
};

export type { Logger } from 'pino';
