/**
 * @fileoverview Application entry point with two-phase lifecycle.
 *
 * Every module finishes init() before any module starts run(), so a broken
 * configuration or an unreadable store stops the process before the HTTP
 * server accepts a connection.
 *
 * @module index
 */

import http from 'node:http';
import type { Express } from 'express';
import type { IDatabaseService } from '@quire/types';
import { env } from './config/env.js';
import { createExpressApp, finalizeExpressApp } from './loaders/express.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { logger } from './lib/logger.js';
import { DatabaseService } from './modules/database/index.js';
import { PagesModule } from './modules/pages/index.js';

/**
 * Shared context passed from the init phase to the run phase.
 */
interface BootstrapContext {
    app: Express;
    server: http.Server;
    database: IDatabaseService | undefined;
    modules: {
        pages: PagesModule;
    };
}

/**
 * Init phase: connect infrastructure and build modules without mounting routes.
 */
async function bootstrapInit(): Promise<BootstrapContext> {
    const app = createExpressApp();
    const server = http.createServer(app);

    let database: IDatabaseService | undefined;
    if (env.CONTENT_STORE === 'mongo' && env.MONGODB_URI) {
        const connection = await connectDatabase(env.MONGODB_URI);
        database = new DatabaseService(logger.child({ module: 'database' }), connection, {
            prefix: env.MONGODB_COLLECTION_PREFIX
        });
    }

    const pages = new PagesModule();
    await pages.init({
        app,
        logger,
        database,
        rootPageTitle: env.ROOT_PAGE_TITLE
    });

    return { app, server, database, modules: { pages } };
}

/**
 * Run phase: mount routers, then install the fallback handlers behind them.
 */
async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    await ctx.modules.pages.run();
    finalizeExpressApp(ctx.app);
}

function registerShutdown(ctx: BootstrapContext): void {
    const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'Shutting down');
        ctx.server.close(error => {
            if (error) {
                logger.error({ error }, 'HTTP server did not close cleanly');
            }
            const closeDatabase = ctx.database ? disconnectDatabase() : Promise.resolve();
            closeDatabase
                .then(() => process.exit(error ? 1 : 0))
                .catch(dbError => {
                    logger.error({ error: dbError }, 'Failed to disconnect from MongoDB');
                    process.exit(1);
                });
        });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

/**
 * Main application entry point.
 *
 * @throws Logs the error and exits with code 1 if bootstrap fails
 */
async function bootstrap(): Promise<void> {
    try {
        const ctx = await bootstrapInit();
        await bootstrapRun(ctx);

        ctx.server.listen(env.PORT, () => {
            logger.info({ port: env.PORT, store: env.CONTENT_STORE }, 'Server listening');
        });

        registerShutdown(ctx);
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }
}

void bootstrap();
