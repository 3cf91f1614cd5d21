import { Router, type NextFunction, type Request, type Response } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { PagesController } from './pages.controller.js';
import { parseErrorResponse } from './rpc.dispatcher.js';

/**
 * Whether an error came from the JSON body parser rejecting malformed JSON.
 */
function isBodyParseError(error: unknown): boolean {
    return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Create the router for the JSON-RPC endpoint. Mounted at /api/rpc.
 */
export function createRpcRouter(controller: PagesController): Router {
    const router = Router();

    router.post('/', asyncHandler(controller.rpc.bind(controller)));

    return router;
}

/**
 * Answer malformed JSON bodies with a JSON-RPC parse error instead of the
 * generic HTTP error response.
 *
 * The app-level body parser fails before any router runs, so this is mounted
 * next to the RPC router rather than inside it.
 */
export function handleRpcParseError(error: unknown, _req: Request, res: Response, next: NextFunction): void {
    if (isBodyParseError(error)) {
        res.json(parseErrorResponse());
        return;
    }
    next(error);
}

/**
 * Create the router for read-only page endpoints. Mounted at /api/pages.
 */
export function createPagesRouter(controller: PagesController): Router {
    const router = Router();

    router.get('/', asyncHandler(controller.getTree.bind(controller)));

    // Before /:id so "by-path" is not taken for an ID
    router.get('/by-path', asyncHandler(controller.getByPath.bind(controller)));

    router.get('/:id/published', asyncHandler(controller.getPublished.bind(controller)));

    return router;
}
