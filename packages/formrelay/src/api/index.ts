export { createApp, startServer, type AppDependencies } from './server.js';
export { CreateEngagementSchema, type CreateEngagementInput } from './schemas/index.js';
