import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Wraps an async route handler so a rejected promise reaches the error
 * middleware through `next()` instead of becoming an unhandled rejection.
 *
 * @example
 * router.get('/widgets', asyncHandler(async (req, res) => {
 *   res.json({ widgets: dispatcher.describeWidgets() });
 * }));
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
    return (req, res, next) => {
        fn(req, res, next).catch(next);
    };
}
