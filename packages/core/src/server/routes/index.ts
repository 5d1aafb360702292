export { configurationRoutes } from './configuration.js';
export { pluginRoutes } from './plugins.js';
export { settingRoutes } from './settings.js';
export type { RouteContext } from './types.js';
