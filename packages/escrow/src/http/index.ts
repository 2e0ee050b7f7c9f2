export {
  createRoutes,
  errorHandler,
  httpStatusFor,
  CALLER_HEADER,
  REQUEST_ID_HEADER,
} from './routes.js';
