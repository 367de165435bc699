export { default as hubPlugin } from './hub-plugin.js';
export { default as errorHandler } from './error-handler.js';
export { default as authRoutes } from './auth-routes.js';
export { default as spokeRoutes } from './spoke-routes.js';
export { default as commandRoutes } from './command-routes.js';
export { default as transitionRoutes } from './transition-routes.js';
export { default as settingsRoutes } from './settings-routes.js';
export { default as userRoutes } from './user-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { requireRole, sessionOf, bearerToken } from './auth-hooks.js';
