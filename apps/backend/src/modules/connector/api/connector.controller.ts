import type { Request, Response } from 'express';
import type { ILogger, ITranslatedResponse } from '@terminal-connector/types';
import { ValidationError } from '../../../lib/errors.js';
import { buildTerminalManifest } from '../renderers/terminal-manifest.js';
import { renderForTerminal } from '../renderers/terminal-renderer.js';
import type { QueryDispatcher } from '../services/query-dispatcher.service.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Raw widget parameters of a request: the query string for GET, the JSON
 * body for POST.
 *
 * @throws ValidationError when a POST body is not a JSON object
 */
export function extractParams(req: Request): Readonly<Record<string, unknown>> {
    if (req.method !== 'POST') {
        return req.query;
    }

    const body: unknown = req.body;
    if (body === undefined || body === null) {
        return {};
    }
    if (!isPlainObject(body)) {
        throw new ValidationError('Request body must be a JSON object of widget parameters');
    }
    return body;
}

/**
 * Aborts when the client disconnects before the response is written, which
 * cancels the in-flight provider call and any pending retry backoff.
 */
export function abortOnClose(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableFinished) {
            controller.abort();
        }
    });
    return controller.signal;
}

/**
 * HTTP controller for discovery and query endpoints.
 *
 * Handlers throw connector errors and leave the response body to the error
 * middleware; they are mounted through asyncHandler.
 */
export class ConnectorController {
    constructor(
        private readonly dispatcher: QueryDispatcher,
        private readonly apps: readonly unknown[],
        private readonly logger: ILogger
    ) {}

    /**
     * GET /api/widgets
     */
    async listWidgets(_req: Request, res: Response): Promise<void> {
        res.json({ widgets: this.dispatcher.describeWidgets() });
    }

    /**
     * GET /widgets.json
     * Widget manifest in the terminal's own configuration format.
     */
    async widgetsManifest(_req: Request, res: Response): Promise<void> {
        res.json(buildTerminalManifest(this.dispatcher.listDescriptors()));
    }

    /**
     * GET /apps.json
     */
    async appsManifest(_req: Request, res: Response): Promise<void> {
        res.json(this.apps);
    }

    /**
     * GET|POST /api/widgets/:widgetId/query
     * Structured response with column metadata and typed rows.
     */
    async queryWidget(req: Request, res: Response): Promise<void> {
        const result = await this.execute(req, res);
        res.json(result);
    }

    /**
     * GET|POST /data/:widgetId
     * Payload shaped for the terminal's renderer of the widget type.
     */
    async widgetData(req: Request, res: Response): Promise<void> {
        const result = await this.execute(req, res);
        const descriptor = this.dispatcher.resolve(result.widgetId);
        res.json(renderForTerminal(descriptor, result));
    }

    private async execute(req: Request, res: Response): Promise<ITranslatedResponse> {
        const widgetId = req.params.widgetId;
        const started = Date.now();

        const result = await this.dispatcher.query({ widgetId, params: extractParams(req) }, abortOnClose(res));

        this.logger.info(
            { requestId: req.id, widgetId, rows: result.rows.length, durationMs: Date.now() - started },
            'Widget query served'
        );
        return result;
    }
}
