export { default as destinationsPlugin } from './destinations-plugin.js';
export type { DestinationsPluginOptions } from './destinations-plugin.js';
export { default as eventRoutes } from './event-routes.js';
export { default as cacheRoutes } from './cache-routes.js';
export { default as destinationRoutes } from './destination-routes.js';
