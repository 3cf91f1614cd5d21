import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import type { ILogger } from '@quire/types';
import type { ContentEngine } from '../services/content-engine.js';
import type { ContentRpcDispatcher } from './rpc.dispatcher.js';
import { serializeComponent, serializePage, serializePageTree } from './serializers.js';

const byPathQuerySchema = z.object({
    path: z.string()
});

const pageIdParamsSchema = z.object({
    id: z.string().min(1)
});

/**
 * HTTP handlers for the pages module.
 *
 * `rpc` carries the JSON-RPC surface used for every mutation. The remaining
 * handlers are read-only conveniences for rendering sites. Handlers throw;
 * routes wrap them with `asyncHandler` so failures reach the error handler.
 */
export class PagesController {
    constructor(
        private readonly engine: ContentEngine,
        private readonly dispatcher: ContentRpcDispatcher,
        private readonly logger: ILogger
    ) {}

    /**
     * POST /api/rpc
     *
     * Body: one JSON-RPC 2.0 request or a batch. Answers 204 when every
     * request was a notification.
     */
    async rpc(req: Request, res: Response): Promise<void> {
        const response = await this.dispatcher.dispatch(req.body);
        if (response === null) {
            res.status(StatusCodes.NO_CONTENT).end();
            return;
        }
        res.json(response);
    }

    /**
     * GET /api/pages
     *
     * Response: { tree: PageNodeWire }
     */
    async getTree(_req: Request, res: Response): Promise<void> {
        res.json({ tree: serializePageTree(this.engine.pages.listTree()) });
    }

    /**
     * GET /api/pages/by-path?path=/about/team
     *
     * Response: { page: PageWire }
     */
    async getByPath(req: Request, res: Response): Promise<void> {
        const { path } = byPathQuerySchema.parse(req.query);
        res.json({ page: serializePage(this.engine.pages.getByPath(path)) });
    }

    /**
     * GET /api/pages/:id/published
     *
     * Published content of a page, for rendering.
     * Response: { page, components, version, published_at }
     */
    async getPublished(req: Request, res: Response): Promise<void> {
        const { id } = pageIdParamsSchema.parse(req.params);
        const page = this.engine.pages.get(id);
        const status = this.engine.versions.getStatus(id);

        this.logger.debug({ pageId: id, version: status.publishedVersion }, 'Serving published content');

        res.json({
            page: serializePage(page),
            components: this.engine.versions.getPublished(id).map(serializeComponent),
            version: status.publishedVersion,
            published_at: status.publishedAt ? status.publishedAt.toISOString() : null
        });
    }
}
