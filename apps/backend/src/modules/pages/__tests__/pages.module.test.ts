/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Express } from 'express';
import { PagesModule } from '../index.js';
import { PAGES_COLLECTION } from '../services/stores/mongo-content.store.js';
import { createMockDatabaseService, type MockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';

/**
 * Express stand-in that records mounted routers.
 */
function createMockApp() {
    const app = { use: vi.fn() };
    return { app, express: app as unknown as Express };
}

describe('PagesModule', () => {
    let module: PagesModule;

    beforeEach(() => {
        module = new PagesModule();
    });

    describe('metadata', () => {
        it('should describe the module', () => {
            expect(module.metadata.id).toBe('pages');
            expect(module.metadata.name).toBe('Pages');
        });
    });

    describe('init()', () => {
        it('should build an in-memory engine when no database is injected', async () => {
            const logger = createMockLogger();
            const { express } = createMockApp();

            await module.init({ app: express, logger, rootPageTitle: 'Welcome' });

            const engine = module.getEngine();
            expect(engine.isInitialized).toBe(true);
            expect(engine.pages.getRoot().title).toBe('Welcome');
            expect(logger.warn).toHaveBeenCalledWith('No database configured; page content is kept in memory only');
        });

        it('should persist through the database when one is injected', async () => {
            const database: MockDatabaseService = createMockDatabaseService();
            const { express } = createMockApp();

            await module.init({ app: express, logger: createMockLogger(), database });

            expect(database.createIndex).toHaveBeenCalledTimes(2);
            expect(database.getCollectionData(PAGES_COLLECTION)).toHaveLength(1);
            expect(module.getEngine().pages.getRoot().title).toBe('Home');
        });

        it('should not mount routes during init', async () => {
            const { app, express } = createMockApp();

            await module.init({ app: express, logger: createMockLogger() });

            expect(app.use).not.toHaveBeenCalled();
        });
    });

    describe('run()', () => {
        it('should mount the RPC and pages routers', async () => {
            const { app, express } = createMockApp();
            await module.init({ app: express, logger: createMockLogger() });

            await module.run();

            expect(app.use).toHaveBeenCalledTimes(2);
            expect(app.use).toHaveBeenNthCalledWith(1, '/api/rpc', expect.any(Function), expect.any(Function));
            expect(app.use).toHaveBeenNthCalledWith(2, '/api/pages', expect.any(Function));
        });
    });

    describe('getEngine()', () => {
        it('should throw before init', () => {
            expect(() => module.getEngine()).toThrow('Pages module not initialized; call init() first');
        });
    });
});
