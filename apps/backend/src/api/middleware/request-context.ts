import type { NextFunction, Request, Response } from 'express';
import { v4 as uuid } from 'uuid';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/u;

/**
 * Assigns the correlation id used in every log line of a request.
 *
 * An inbound `x-request-id` is reused when it looks like an id; anything else
 * (missing, oversized, free text) is replaced by a fresh UUID. The id is echoed
 * back in the response header.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
    const inbound = req.headers['x-request-id'];
    const candidate = Array.isArray(inbound) ? inbound[0] : inbound;
    const requestId = candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : uuid();

    req.id = requestId;
    res.setHeader('x-request-id', requestId);
    next();
}
