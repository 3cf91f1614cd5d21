import type { NextFunction, Request, Response } from 'express';

/**
 * Forward rejections from an async route handler to the Express error middleware.
 *
 * @example
 * router.get('/', asyncHandler(controller.getTree.bind(controller)));
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        fn(req, res, next).catch(next);
    };
}
