export { CreateEngagementSchema, type CreateEngagementInput } from './engagement.js';
