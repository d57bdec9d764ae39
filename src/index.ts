/**
 * Lending Hub - Main Entry Point
 * Pool accounting and loan risk engine for the cross-chain lending hub
 *
 * STORAGE: PostgreSQL when DATABASE_URL is set, in-memory otherwise
 */

import { loadConfig } from './config';
import { assertSchemaReady, closePool, openPool } from './database/connection';
import { PostgresLendingRepository } from './database/lending.repository';
import { PostgresPriceOracle, PostgresReceiptTokenLedger } from './database/market.repository';
import {
  InMemoryLendingRepository,
  InMemoryPriceOracle,
  InMemoryReceiptTokenLedger,
  LendingRepository,
  LoanManagerService,
  PriceOracle,
  ReceiptTokenLedger,
  SystemClock,
} from './modules/loan-manager';
import { ActionProcessor } from './workers/actionProcessor';
import { createServer } from './api';

async function bootstrap(): Promise<void> {
  console.log('='.repeat(60));
  console.log('  LENDING HUB');
  console.log('  Pool accounting and loan risk engine');
  console.log('='.repeat(60));

  const config = loadConfig();

  const pool = config.DATABASE_URL ? openPool(config.DATABASE_URL) : null;
  if (pool) {
    console.log('\n[Boot] Checking database schema...');
    await assertSchemaReady(pool);
  }

  let repository: LendingRepository;
  let oracle: PriceOracle;
  let tokens: ReceiptTokenLedger;
  if (pool) {
    console.log('[Boot] Initializing PostgreSQL repositories...');
    repository = new PostgresLendingRepository(pool);
    oracle = new PostgresPriceOracle(pool);
    tokens = new PostgresReceiptTokenLedger(pool);
  } else {
    console.warn('[Boot] DATABASE_URL not set: state lives in memory and is lost on restart');
    repository = new InMemoryLendingRepository();
    oracle = new InMemoryPriceOracle();
    tokens = new InMemoryReceiptTokenLedger();
  }

  console.log('[Boot] Initializing loan manager...');
  const service = new LoanManagerService(repository, oracle, tokens, new SystemClock());
  service.events.subscribe((envelope) => {
    console.log(`[Events] ${envelope.event.type} ${envelope.id}`);
  });
  const processor = new ActionProcessor(service);

  console.log('[Boot] Configuring Express server...');
  const app = createServer({ service, processor, mode: pool ? 'postgres' : 'memory' }, config);

  const server = app.listen(config.PORT, () => {
    console.log(`\n[Boot] Server listening on port ${config.PORT}`);
    console.log('[Boot] Endpoints:');
    console.log(`  - Health: http://localhost:${config.PORT}/health`);
    console.log(`  - Actions: http://localhost:${config.PORT}/v1/actions`);
    console.log(`  - Admin: http://localhost:${config.PORT}/admin/actions`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down gracefully...`);

    await new Promise<void>((resolve) => {
      server.close(() => {
        console.log('[Shutdown] HTTP server closed');
        resolve();
      });
    });

    await closePool();

    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      console.error('[Shutdown] Failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  console.log('\n[Boot] LENDING HUB ONLINE');
}

bootstrap().catch((error) => {
  console.error('[Boot] Fatal error during startup:', error);
  process.exit(1);
});
