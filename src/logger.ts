import winston from 'winston';
import { logLevelFrom } from './config/env';

export const createLogger = (service: string, source: NodeJS.ProcessEnv = process.env) => {
  const level = logLevelFrom(source);
  return winston.createLogger({
    level: level === 'silent' ? 'error' : level,
    silent: level === 'silent',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    defaultMeta: { service },
    transports: [new winston.transports.Console()],
  });
};
