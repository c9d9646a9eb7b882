import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import type { Express } from 'express';
import type { ILogger } from '@terminal-connector/types';
import { createErrorHandler } from '../api/middleware/error-handler.js';
import { requestContext } from '../api/middleware/request-context.js';
import { RouteNotFoundError } from '../lib/errors.js';
import type { ConnectorConfig } from '../config/connector.js';

export interface ExpressAppOptions {
    config: ConnectorConfig;
    logger: ILogger;

    /**
     * Access log format; `false` disables the access log (tests).
     */
    accessLog?: 'combined' | 'dev' | false;
}

/**
 * Create the Express app with the shared middleware stack and the public
 * routes. Module routers are mounted afterwards, then `finalizeExpressApp`
 * adds the error handler.
 */
export function createExpressApp(options: ExpressAppOptions): Express {
    const { config } = options;
    const app = express();

    app.set('trust proxy', true);
    app.use(requestContext);
    app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));

    // The terminal runs in the browser on its hosted origins or the desktop app
    const allowedOrigins = new Set(config.cors.origins);
    app.use(cors({
        origin: (origin, callback) => {
            // Allow requests with no origin (curl, server-to-server)
            if (!origin || allowedOrigins.has(origin)) {
                callback(null, true);
                return;
            }
            callback(null, false);
        },
        credentials: true
    }));

    // JSON bodies are parsed by the module routers, after the credential check
    app.use(compression());
    if (options.accessLog !== false) {
        app.use(morgan(options.accessLog ?? 'dev'));
    }

    app.get('/', (_req, res) => {
        res.json({ info: 'Terminal connector backend', widgets: config.registry.size });
    });

    app.get('/api/health', (_req, res) => {
        res.json({ status: 'ok', timestamp: Date.now() });
    });

    return app;
}

/**
 * Register the JSON 404 and the error handler. Must run after every module
 * has mounted its routes.
 */
export function finalizeExpressApp(app: Express, logger: ILogger): void {
    app.use((req, _res, next) => {
        next(new RouteNotFoundError(req.method, req.path));
    });
    app.use(createErrorHandler(logger));
}
