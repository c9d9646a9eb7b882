import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { ILogger } from '@terminal-connector/types';
import type { CredentialGuard } from '../../modules/connector/services/credential-guard.service.js';

function firstHeader(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

/**
 * Extract the credential a terminal presented.
 *
 * Supported authentication methods:
 * - X-API-Key: {key} header (what the terminal's "Connect Backend" dialog sends)
 * - Authorization: Bearer {key} header
 *
 * Query string keys are not accepted: URLs end up in access logs and proxies.
 */
export function extractCredential(req: Request): string | undefined {
    const apiKey = firstHeader(req.headers['x-api-key']);
    if (apiKey) {
        return apiKey;
    }

    const authorization = firstHeader(req.headers.authorization);
    if (authorization && authorization.startsWith('Bearer ')) {
        return authorization.substring(7).trim();
    }

    return undefined;
}

/**
 * Credential middleware. Runs before any discovery or query handler and
 * forwards UnauthorizedError to the error handler on rejection, so no
 * downstream component is reached without a valid credential.
 *
 * @param guard - Guard holding the connector credential
 * @param logger - Receives one warning per rejection (path and request id only)
 */
export function requireCredential(guard: CredentialGuard, logger?: ILogger): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction) => {
        const result = guard.authorize(extractCredential(req));

        if (!result.authorized) {
            logger?.warn({ requestId: req.id, method: req.method, path: req.path }, 'Rejected request without valid credential');
            next(result.error);
            return;
        }

        next();
    };
}
