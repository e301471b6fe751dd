export { createVerifyRouter } from './verify.routes.js';
export { createUsersRouter } from './users.routes.js';
export { createAgentsRouter } from './agents.routes.js';
export type { ApiDependencies } from './types.js';
