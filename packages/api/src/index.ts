export { createApp, type AppDeps } from './app.js';
export { createServices, type Services } from './context.js';
export { startServer } from './server.js';
export { toErrorResponse, requireApiKey, errorHandler } from './middleware.js';
