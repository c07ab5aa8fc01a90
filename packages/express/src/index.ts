// @is-it-spam/express: Express adapter

export {
  createSpamCheckMiddleware,
  type SpamCheckMiddlewareOptions,
  type SpamCheckRequest,
  type SpamCheckResponse,
  type FlashHandler,
} from './middleware/spam-check.js';
export { createHealthRoutes, createHealthHandler, type HealthResponse } from './routes/health.js';
