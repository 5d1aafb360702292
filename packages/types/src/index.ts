export type * from './context.js';
export type * from './configuration.js';
export type * from './plugin.js';
export type * from './settings.js';
export type * from './services.js';
export type * from './events.js';
