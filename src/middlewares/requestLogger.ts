import morgan, { StreamOptions } from 'morgan';
import logger from '../utils/logger';
import { env } from '../config';

// Morgan stream for Winston, at the http level
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

// Skip logging in test environment
const skip = (): boolean => {
  return env.NODE_ENV === 'test';
};

// Request logger middleware
export const requestLogger = morgan(
  env.NODE_ENV === 'production' ? 'combined' : 'dev',
  { stream, skip }
);

export default requestLogger;
