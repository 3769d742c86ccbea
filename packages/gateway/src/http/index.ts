export type { RouteDependencies } from './routes.js';
export { createRoutes, errorHandler } from './routes.js';
