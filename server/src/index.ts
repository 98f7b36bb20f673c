/**
 * Server entry point
 *
 * Run: npm run dev --workspace @workshop-ledger/server
 */

import type { Server } from 'node:http';
import { env } from './config/env.js';
import { createApp } from './app.js';
import { createKysely, destroyKysely } from './db/kysely.js';
import { createKyselyStore } from './db/kyselyStore.js';
import { migrateToLatest } from './db/migrator.js';
import { catalogGuard } from './services/catalogSeeder.js';
import logger from './utils/logger.js';
import { shutdownCoordinator } from './utils/shutdownCoordinator.js';

async function start(): Promise<void> {
    if (!env.DATABASE_URL) {
        throw new Error('DATABASE_URL is required to start the server');
    }

    const db = createKysely(env.DATABASE_URL);
    shutdownCoordinator.register('database', () => destroyKysely());

    if (env.AUTO_MIGRATE === 'true') {
        await migrateToLatest(db);
    }

    const store = createKyselyStore(db);
    const seeded = await catalogGuard.ensure(store);
    logger.info(seeded, 'Reference catalog ready');

    const app = createApp({ store });
    const server: Server = app.listen(env.PORT, () => {
        logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Server listening');
    });

    shutdownCoordinator.register('http', () => closeServer(server));
}

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}

async function stop(signal: string): Promise<void> {
    logger.info({ signal }, 'Shutdown signal received');
    const results = await shutdownCoordinator.shutdown();
    process.exit(results.every((r) => r.success) ? 0 : 1);
}

process.on('SIGTERM', () => {
    stop('SIGTERM').catch((error: unknown) => {
        logger.fatal({ error }, 'Shutdown failed');
        process.exit(1);
    });
});
process.on('SIGINT', () => {
    stop('SIGINT').catch((error: unknown) => {
        logger.fatal({ error }, 'Shutdown failed');
        process.exit(1);
    });
});

start().catch((error: unknown) => {
    logger.fatal({ error }, 'Server failed to start');
    process.exit(1);
});
