import type { Express } from 'express';
import type { IContentStore, IDatabaseService, ILogger, IModule, IModuleMetadata } from '@quire/types';
import { ContentEngine } from './services/content-engine.js';
import { MemoryContentStore } from './services/stores/memory-content.store.js';
import { MongoContentStore } from './services/stores/mongo-content.store.js';
import { ContentRpcDispatcher } from './api/rpc.dispatcher.js';
import { PagesController } from './api/pages.controller.js';
import { createPagesRouter, createRpcRouter, handleRpcParseError } from './api/pages.routes.js';

/**
 * Pages module dependencies for initialization.
 */
export interface IPagesModuleDependencies {
    /**
     * Express application the module mounts its routers on during run().
     */
    app: Express;

    logger: ILogger;

    /**
     * Database service for MongoDB persistence. Without it content lives in
     * process memory and is lost on restart.
     */
    database?: IDatabaseService;

    /**
     * Title of the root page created when the store is empty.
     */
    rootPageTitle?: string;
}

/**
 * Pages module: page hierarchy, draft components and publishing.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Picks the content store (MongoDB when a database is injected, memory otherwise)
 * - Builds the content engine and hydrates it, creating the root page on first start
 * - Creates the RPC dispatcher and controller
 * - Does NOT mount routes yet
 *
 * ### run() phase:
 * - Mounts the JSON-RPC router at /api/rpc
 * - Mounts the read-only pages router at /api/pages
 *
 * The module mounts its own routers on the injected app instead of handing
 * them back to the bootstrap code.
 */
export class PagesModule implements IModule<IPagesModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'pages',
        name: 'Pages',
        version: '1.0.0',
        description: 'Page hierarchy, draft components and publishing'
    };

    private app!: Express;
    private logger!: ILogger;
    private engine!: ContentEngine;
    private controller!: PagesController;

    async init(dependencies: IPagesModuleDependencies): Promise<void> {
        this.app = dependencies.app;
        this.logger = dependencies.logger.child({ module: 'pages' });

        this.logger.info('Initializing pages module...');

        const store = await this.createStore(dependencies.database);

        this.engine = new ContentEngine({
            store,
            logger: this.logger,
            rootTitle: dependencies.rootPageTitle
        });
        await this.engine.initialize();

        const dispatcher = new ContentRpcDispatcher(this.engine, this.logger.child({ component: 'rpc' }));
        this.controller = new PagesController(this.engine, dispatcher, this.logger);

        this.logger.info('Pages module initialized');
    }

    async run(): Promise<void> {
        this.logger.info('Running pages module...');

        this.app.use('/api/rpc', createRpcRouter(this.controller), handleRpcParseError);
        this.app.use('/api/pages', createPagesRouter(this.controller));

        this.logger.info({ rpc: '/api/rpc', pages: '/api/pages' }, 'Pages module running');
    }

    /**
     * Content engine built during init(), for modules and tests that need
     * direct access.
     *
     * @throws Error if called before init()
     */
    getEngine(): ContentEngine {
        if (!this.engine) {
            throw new Error('Pages module not initialized; call init() first');
        }
        return this.engine;
    }

    private async createStore(database: IDatabaseService | undefined): Promise<IContentStore> {
        if (!database) {
            this.logger.warn('No database configured; page content is kept in memory only');
            return new MemoryContentStore();
        }

        const store = new MongoContentStore(database, this.logger.child({ component: 'mongo-store' }));
        await store.ensureIndexes();
        return store;
    }
}
