import pino from 'pino';
import type { AppConfig } from './config';

const STDERR = 2;

// game text owns stdout, so log lines always go to stderr
export const createLogger = (config: Pick<AppConfig, 'logLevel' | 'isProduction'>): pino.Logger => {
  const loggerOptions: pino.LoggerOptions = {
    level: config.logLevel,
  };

  if (!config.isProduction) {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true, destination: STDERR },
    };
    return pino(loggerOptions);
  }

  return pino(loggerOptions, pino.destination(STDERR));
};
