/**
 * Lending Hub - API Module Export
 */

export { createServer, ServerDependencies } from './server';
export { createActionRoutes } from './routes/action.routes';
export { createQueryRoutes } from './routes/query.routes';
export { adminAuthMiddleware, hubAuthMiddleware, verifyApiKey } from './middleware/auth.middleware';
export { httpStatusFor, sendError } from './errors';
