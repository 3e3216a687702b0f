import pino, { type Logger } from 'pino';
import { SDK_NAME } from './version';

export const logger = pino({
  name: SDK_NAME,
  level: process.env.HYP3_LOG_LEVEL || 'info',
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
