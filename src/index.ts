/**
 * Shares Gatekeeper
 *
 * Entry point: loads configuration, opens the ledger database, starts one
 * sync worker per configured chain and the HTTP API.
 */

import { defaultChainOf, loadConfig } from './config.js';
import { closeDatabase, initDatabase } from './db/connection.js';
import { createApp, startServer, stopServer } from './api/server.js';
import { createChainAdapters } from './packages/adapters/chain/index.js';
import {
  SqliteCheckpointStore,
  SqliteCommunityRegistry,
  SqliteIdentityStore,
  SqliteLedgerStore,
} from './packages/adapters/storage/index.js';
import { TelegramAccessNotifier } from './packages/adapters/telegram/TelegramAccessNotifier.js';
import { SyncEngine, SyncSupervisor } from './packages/jobs/sync/index.js';
import { AccessPolicy, LedgerService } from './services/index.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logging.level;

  const db = initDatabase(config.database.path);

  const adapters = createChainAdapters(config, logger);
  for (const adapter of adapters.values()) {
    await adapter.checkConnectivity();
  }

  const checkpoints = new SqliteCheckpointStore(db);
  const identities = new SqliteIdentityStore(db);
  const communities = new SqliteCommunityRegistry(db);
  const ledger = new LedgerService(new SqliteLedgerStore(db), logger);
  const accessPolicy = new AccessPolicy({
    adapters,
    identities,
    communities,
    notifier: new TelegramAccessNotifier({ logger }),
    defaultChain: defaultChainOf(config),
    logger,
  });

  const supervisor = new SyncSupervisor(logger, {
    restartDelayMs: config.sync.workerRestartDelayMs,
  });
  for (const adapter of adapters.values()) {
    supervisor.start(
      new SyncEngine(
        adapter,
        { checkpoints, ledger, transitions: accessPolicy, logger },
        {
          idleIntervalMs: config.sync.idleIntervalMs,
          retryIntervalMs: config.sync.retryIntervalMs,
          pacingIntervalMs: config.sync.pacingIntervalMs,
        }
      )
    );
  }

  const app = createApp({
    accessPolicy,
    ledger,
    communities,
    chains: new Map([...adapters].map(([name, adapter]) => [name, adapter.family] as const)),
    defaultChain: defaultChainOf(config),
    workers: () => supervisor.getStatus(),
    logger,
  });
  const server = await startServer(app, config.api);

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ reason }, 'Shutting down');

    await supervisor.stop();
    if (server.listening) {
      await stopServer(server);
    }
    closeDatabase();
    process.exit(0);
  };

  const onShutdown = (reason: string) => {
    shutdown(reason).catch((error: unknown) => {
      logger.fatal({ error: errorMessage(error) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onShutdown('SIGINT'));
  process.on('SIGTERM', () => onShutdown('SIGTERM'));
  server.on('close', () => onShutdown('listener closed'));

  logger.info(
    { chains: [...adapters.keys()], port: config.api.port },
    'Shares gatekeeper running'
  );
}

process.on('unhandledRejection', (reason) => {
  logger.error({ error: errorMessage(reason) }, 'Unhandled promise rejection');
});

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, 'Startup failed');
  closeDatabase();
  process.exit(1);
});
