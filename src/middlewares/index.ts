export { errorHandler } from './errorHandler';
export { notFound } from './notFound';
export { requestLogger } from './requestLogger';
export { validateRequest, parseRequest } from './validateRequest';
