import morgan, { StreamOptions } from 'morgan';
import { Request } from 'express';
import { logger } from '../utils';
import { env } from '../config';

// Morgan stream into winston's http level
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

// Nothing in tests; orchestrator probes are noise in production
const skip = (req: Request): boolean => {
  if (env.NODE_ENV === 'test') {
    return true;
  }
  return env.NODE_ENV === 'production' && req.originalUrl.startsWith(`${env.API_PREFIX}/health`);
};

// Request logger middleware
export const requestLogger = morgan<Request>(env.NODE_ENV === 'production' ? 'combined' : 'dev', {
  stream,
  skip,
});

export default requestLogger;
