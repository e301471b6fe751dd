import type { Logger } from 'pino';
import type { ICommunityRegistry } from '../../packages/core/ports/ICommunityRegistry.js';
import type { WorkerStatus } from '../../packages/jobs/sync/SyncSupervisor.js';
import type { AccessPolicy } from '../../services/AccessPolicy.js';
import type { LedgerService } from '../../services/LedgerService.js';
import type { ChainFamily, ChainType } from '../../types/index.js';

/**
 * Everything the HTTP layer needs, injected by the entry point (or a test)
 */
export interface ApiDependencies {
  accessPolicy: Pick<AccessPolicy, 'checkAccess'>;
  ledger: Pick<LedgerService, 'getHoldings'>;
  communities: ICommunityRegistry;
  /** Configured chains and the family each belongs to */
  chains: ReadonlyMap<ChainType, ChainFamily>;
  defaultChain: ChainType;
  workers?: () => WorkerStatus[];
  logger: Logger;
}
