import { Request } from 'express';
import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

// Morgan stream for Winston
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

// Uploaded document name, "-" for requests without one
morgan.token<Request>('document', (req) => req.file?.originalname ?? '-');

const DEV_FORMAT = ':method :url :status :response-time ms - :document';
const PRODUCTION_FORMAT =
  ':remote-addr ":method :url HTTP/:http-version" :status :res[content-length] :response-time ms :document';

// Request logger middleware (silent under test)
export const requestLogger = morgan(env.NODE_ENV === 'production' ? PRODUCTION_FORMAT : DEV_FORMAT, {
  stream,
  skip: () => env.NODE_ENV === 'test',
});

export default requestLogger;
