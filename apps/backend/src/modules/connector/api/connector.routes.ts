import express, { Router, type RequestHandler } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { ConnectorController } from './connector.controller.js';

/**
 * Body parser for POST queries. Mounted behind the credential middleware so
 * unauthenticated bodies are never read.
 */
const jsonBody = express.json({ limit: '100kb' });

/**
 * Routes the terminal calls directly. Mounted at the server root.
 *
 * Each route carries the credential middleware itself so unrelated root paths
 * (service info, health) stay public.
 *
 * @param controller - Connector controller instance
 * @param auth - Credential middleware
 */
export function createTerminalRouter(controller: ConnectorController, auth: RequestHandler): Router {
    const router = Router();

    // GET /widgets.json - Terminal widget manifest
    router.get('/widgets.json', auth, asyncHandler(controller.widgetsManifest.bind(controller)));

    // GET /apps.json - Terminal app layouts
    router.get('/apps.json', auth, asyncHandler(controller.appsManifest.bind(controller)));

    // GET|POST /data/:widgetId - Rendered widget payload
    router.get('/data/:widgetId', auth, asyncHandler(controller.widgetData.bind(controller)));
    router.post('/data/:widgetId', auth, jsonBody, asyncHandler(controller.widgetData.bind(controller)));

    return router;
}

/**
 * Structured discovery and query API. Mounted at /api/widgets.
 *
 * @param controller - Connector controller instance
 * @param auth - Credential middleware
 */
export function createWidgetApiRouter(controller: ConnectorController, auth: RequestHandler): Router {
    const router = Router();
    router.use(auth);

    // GET /api/widgets - Discovery
    router.get('/', asyncHandler(controller.listWidgets.bind(controller)));

    // GET|POST /api/widgets/:widgetId/query - Structured query
    router.get('/:widgetId/query', asyncHandler(controller.queryWidget.bind(controller)));
    router.post('/:widgetId/query', jsonBody, asyncHandler(controller.queryWidget.bind(controller)));

    return router;
}
