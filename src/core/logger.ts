import pino from 'pino';
import { env } from './env';

const logger = pino({
  name: 'status-relay',
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'development' ? 'debug' : 'info'),
});
export { logger };
