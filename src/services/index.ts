export { LedgerService } from './LedgerService.js';
export { AccessPolicy, type AccessPolicyDeps } from './AccessPolicy.js';
