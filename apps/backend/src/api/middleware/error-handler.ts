import type { ErrorRequestHandler } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { IConnectorErrorBody, ILogger } from '@terminal-connector/types';
import { ConnectorError, RequestAbortedError, ValidationError } from '../../lib/errors.js';

interface BodyParserFailure {
    type: string;
    status: number;
}

/**
 * body-parser rejects client input with http-errors carrying a `type` and a
 * 4xx `status` (malformed JSON, oversized body, unsupported charset or
 * encoding, aborted upload).
 */
function asBodyParserFailure(error: unknown): BodyParserFailure | undefined {
    if (typeof error !== 'object' || error === null || !('type' in error) || !('status' in error)) {
        return undefined;
    }
    const { type, status } = error;
    if (typeof type !== 'string' || typeof status !== 'number') {
        return undefined;
    }
    if (status < StatusCodes.BAD_REQUEST || status >= StatusCodes.INTERNAL_SERVER_ERROR) {
        return undefined;
    }
    return { type, status };
}

function fromBodyParserFailure(failure: BodyParserFailure): ConnectorError {
    switch (failure.type) {
        case 'entity.parse.failed':
            return new ValidationError('Request body is not valid JSON');
        case 'entity.too.large':
            return new ConnectorError('Request body exceeds the size limit', 'VALIDATION_ERROR', failure.status);
        default:
            return new ConnectorError('Request body could not be read', 'VALIDATION_ERROR', failure.status);
    }
}

/**
 * Convert a failure into the JSON body the terminal reads.
 */
export function toErrorBody(error: ConnectorError): IConnectorErrorBody {
    const body: IConnectorErrorBody = {
        success: false,
        error: { kind: error.code, message: error.message }
    };
    if (error.field) {
        body.error.field = error.field;
    }
    return body;
}

interface ClassifiedError {
    error: ConnectorError;
    unexpected: boolean;
}

function classify(error: unknown): ClassifiedError {
    if (error instanceof ConnectorError) {
        return { error, unexpected: false };
    }
    const bodyFailure = asBodyParserFailure(error);
    if (bodyFailure) {
        return { error: fromBodyParserFailure(bodyFailure), unexpected: false };
    }
    return { error: new ConnectorError('Internal server error'), unexpected: true };
}

/**
 * Final Express error middleware.
 *
 * Connector errors keep their kind, status and message. Bodies body-parser
 * refuses become validation errors with the parser's status. Anything else
 * is logged with the request id and answered with a generic INTERNAL_ERROR,
 * never with the original message.
 */
export function createErrorHandler(logger: ILogger): ErrorRequestHandler {
    return (error: unknown, req, res, _next) => {
        if (error instanceof RequestAbortedError) {
            logger.debug({ requestId: req.id, path: req.path }, 'Request aborted by client');
            if (!res.headersSent) {
                res.end();
            }
            return;
        }

        const { error: connectorError, unexpected } = classify(error);

        if (unexpected) {
            logger.error({ error, requestId: req.id, method: req.method, path: req.path }, 'Unhandled error');
        } else if (connectorError.status >= StatusCodes.INTERNAL_SERVER_ERROR) {
            logger.error(
                { requestId: req.id, kind: connectorError.code, message: connectorError.message, details: connectorError.details },
                'Request failed'
            );
        } else {
            logger.warn(
                { requestId: req.id, kind: connectorError.code, message: connectorError.message, field: connectorError.field },
                'Request rejected'
            );
        }

        if (res.headersSent) {
            res.end();
            return;
        }
        res.status(connectorError.status).json(toErrorBody(connectorError));
    };
}
