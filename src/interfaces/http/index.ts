export { default as eventRoutes } from './event-routes.js';
export type { EventRoutesOptions } from './event-routes.js';
export { default as adminRoutes } from './admin-routes.js';
export type { AdminRoutesOptions } from './admin-routes.js';
export { default as systemRoutes, APP_VERSION } from './system-routes.js';
