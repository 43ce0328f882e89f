export { createApp } from './app.js';
export {
  ApiError,
  ValidationError,
  NotFoundError,
  InternalError,
  errorHandler,
  notFoundHandler,
  asyncHandler,
} from './middleware/error-handler.js';
export { requestContext, REQUEST_ID_HEADER } from './middleware/request-context.js';
