export { errorHandler } from './errorHandler';
export { notFound } from './notFound';
export { requestLogger } from './requestLogger';
export { uploadDocument } from './upload';
export { validateRequest, commonSchemas } from './validateRequest';
