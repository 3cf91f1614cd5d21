/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Request, Response } from 'express';
import { ZodError } from 'zod';
import { PagesController } from '../api/pages.controller.js';
import { ContentRpcDispatcher } from '../api/rpc.dispatcher.js';
import { ContentEngine } from '../services/content-engine.js';
import { MemoryContentStore } from '../services/stores/memory-content.store.js';
import { NotFoundError } from '../../../lib/errors.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';

/**
 * Helper to create mock Express Request object.
 */
function createMockRequest(overrides: Partial<Request> = {}): Request {
    return {
        params: {},
        query: {},
        body: {},
        ...overrides
    } as Request;
}

/**
 * Helper to create mock Express Response object.
 */
function createMockResponse() {
    const res = {
        status: vi.fn().mockReturnThis(),
        json: vi.fn().mockReturnThis(),
        end: vi.fn().mockReturnThis()
    };
    return { res, response: res as unknown as Response };
}

describe('PagesController', () => {
    let engine: ContentEngine;
    let controller: PagesController;

    beforeEach(async () => {
        const logger = createMockLogger();
        engine = new ContentEngine({ store: new MemoryContentStore(), logger });
        await engine.initialize();
        controller = new PagesController(engine, new ContentRpcDispatcher(engine, logger), logger);
    });

    // ============================================================================
    // POST /api/rpc
    // ============================================================================

    describe('rpc', () => {
        it('should answer a request with the dispatcher response', async () => {
            const { res, response } = createMockResponse();

            await controller.rpc(
                createMockRequest({ body: { jsonrpc: '2.0', id: 3, method: 'get_page_by_path', params: { path: '/' } } }),
                response
            );

            expect(res.status).not.toHaveBeenCalled();
            expect(res.json).toHaveBeenCalledWith(
                expect.objectContaining({ jsonrpc: '2.0', id: 3, result: expect.objectContaining({ path: '/' }) })
            );
        });

        it('should answer 204 with no body for notifications', async () => {
            const { res, response } = createMockResponse();

            await controller.rpc(
                createMockRequest({
                    body: {
                        jsonrpc: '2.0',
                        method: 'create_page',
                        params: { parent_page_id: engine.pages.getRoot()._id, title: 'Later' }
                    }
                }),
                response
            );

            expect(res.status).toHaveBeenCalledWith(204);
            expect(res.end).toHaveBeenCalled();
            expect(res.json).not.toHaveBeenCalled();
            expect(engine.pages.getByPath('/later').title).toBe('Later');
        });
    });

    // ============================================================================
    // Read-only routes
    // ============================================================================

    describe('getTree', () => {
        it('should return the whole tree', async () => {
            await engine.pages.create(engine.pages.getRoot()._id, { title: 'Docs' });
            const { res, response } = createMockResponse();

            await controller.getTree(createMockRequest(), response);

            expect(res.json).toHaveBeenCalledWith({
                tree: expect.objectContaining({
                    path: '/',
                    children: [expect.objectContaining({ path: '/docs', children: [] })]
                })
            });
        });
    });

    describe('getByPath', () => {
        it('should return the page at the path', async () => {
            const page = await engine.pages.create(engine.pages.getRoot()._id, { title: 'Team' });
            const { res, response } = createMockResponse();

            await controller.getByPath(createMockRequest({ query: { path: '/team' } }), response);

            expect(res.json).toHaveBeenCalledWith({ page: expect.objectContaining({ id: page._id, slug: 'team' }) });
        });

        it('should reject a missing path query', async () => {
            const { response } = createMockResponse();

            await expect(controller.getByPath(createMockRequest(), response)).rejects.toBeInstanceOf(ZodError);
        });

        it('should propagate NotFoundError for unknown paths', async () => {
            const { response } = createMockResponse();

            await expect(
                controller.getByPath(createMockRequest({ query: { path: '/nowhere' } }), response)
            ).rejects.toBeInstanceOf(NotFoundError);
        });
    });

    describe('getPublished', () => {
        it('should return published content only', async () => {
            const page = await engine.pages.create(engine.pages.getRoot()._id, { title: 'About' });
            await engine.components.create(page._id, { body: 'live' });
            await engine.versions.publish(page._id);
            await engine.components.create(page._id, { body: 'pending' });
            const { res, response } = createMockResponse();

            await controller.getPublished(createMockRequest({ params: { id: page._id } }), response);

            expect(res.json).toHaveBeenCalledWith({
                page: expect.objectContaining({ id: page._id }),
                components: [expect.objectContaining({ body: 'live', position: 0 })],
                version: 1,
                published_at: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/)
            });
        });

        it('should report an unpublished page with an empty component list', async () => {
            const page = await engine.pages.create(engine.pages.getRoot()._id, { title: 'Draft' });
            const { res, response } = createMockResponse();

            await controller.getPublished(createMockRequest({ params: { id: page._id } }), response);

            expect(res.json).toHaveBeenCalledWith(
                expect.objectContaining({ components: [], version: null, published_at: null })
            );
        });

        it('should propagate NotFoundError for unknown pages', async () => {
            const { response } = createMockResponse();

            await expect(
                controller.getPublished(createMockRequest({ params: { id: 'missing' } }), response)
            ).rejects.toBeInstanceOf(NotFoundError);
        });
    });
});
