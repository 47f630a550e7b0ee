export { default as logger, Logging, componentLogger } from './logger';
export { sendSuccess, sendError } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError } from './AppError';
export {
  DomainError,
  MalformedDocumentError,
  CatalogUnavailableError,
  InvalidMatchTargetError,
  PersistenceFailureError,
  describeError,
  type ErrorKind,
} from './errors';
