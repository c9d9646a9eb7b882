/**
 * @fileoverview Connector entry point with two-phase lifecycle.
 *
 * Configuration is parsed and frozen before anything else; a bad environment
 * stops the process with exit code 1 before a socket is opened. Modules then
 * complete init() before any of them runs, so routes are only mounted once
 * every service exists.
 *
 * @module index
 */

import http from 'node:http';
import type { Express } from 'express';
import { createConnectorConfig, type ConnectorConfig } from './config/connector.js';
import { EnvironmentError, loadEnv, type EnvConfig } from './config/env.js';
import { createLogger, parseModuleLevels, type ConnectorLogger } from './lib/logger.js';
import { createExpressApp, finalizeExpressApp } from './loaders/express.js';
import { ConnectorModule, widgetCatalog } from './modules/connector/index.js';

interface BootstrapContext {
    app: Express;
    config: ConnectorConfig;
    logger: ConnectorLogger;
    modules: {
        connector: ConnectorModule;
    };
}

function buildLogger(env: EnvConfig): ConnectorLogger {
    const production = env.NODE_ENV === 'production';
    return createLogger({
        level: env.LOG_LEVEL ?? (production ? 'info' : 'debug'),
        pretty: !production,
        moduleLevels: parseModuleLevels(env.MODULE_LOG_LEVELS)
    });
}

/**
 * Init phase: parse configuration, build the app, initialize modules.
 */
async function bootstrapInit(env: EnvConfig, logger: ConnectorLogger): Promise<BootstrapContext> {
    const config = createConnectorConfig(env, widgetCatalog);
    const app = createExpressApp({
        config,
        logger,
        accessLog: env.NODE_ENV === 'production' ? 'combined' : 'dev'
    });

    const connector = new ConnectorModule();
    await connector.init({ app, config, logger });

    return { app, config, logger, modules: { connector } };
}

/**
 * Run phase: mount module routes, then the error handler.
 */
async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    await ctx.modules.connector.run();
    finalizeExpressApp(ctx.app, ctx.logger.forModule('http'));
    ctx.logger.info({}, 'All modules initialized');
}

async function bootstrap(): Promise<void> {
    let env: EnvConfig;
    try {
        env = loadEnv();
    } catch (error) {
        const fallback = createLogger({ level: 'info', pretty: false });
        if (error instanceof EnvironmentError) {
            fallback.fatal({ fields: error.fieldErrors }, 'Invalid configuration');
        } else {
            fallback.fatal({ error }, 'Failed to load configuration');
        }
        process.exit(1);
    }

    const logger = buildLogger(env);

    try {
        const ctx = await bootstrapInit(env, logger);
        await bootstrapRun(ctx);

        const server = http.createServer(ctx.app);
        const { host, port } = ctx.config.server;
        server.listen(port, host, () => {
            logger.info({ host, port, widgets: ctx.config.registry.size }, 'Server listening');
        });

        const shutdown = (signal: NodeJS.Signals) => {
            logger.info({ signal }, 'Shutting down');
            server.close(() => process.exit(0));
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
    } catch (error) {
        logger.fatal({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }
}

void bootstrap();
