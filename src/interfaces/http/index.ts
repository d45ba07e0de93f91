export { default as eventRoutes } from './event-routes.js';
export { default as traceRoutes } from './trace-routes.js';
export { default as capturePlugin, FastifyCaptureAdapter } from './capture-plugin.js';
export type { CapturePluginOptions } from './capture-plugin.js';
export { registerErrorHandler } from './error-handler.js';
