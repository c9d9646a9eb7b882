import { readFile } from 'node:fs/promises';
import type { AxiosInstance } from 'axios';
import type { Express } from 'express';
import { z } from 'zod';
import type { IModule, IModuleMetadata } from '@terminal-connector/types';
import { requireCredential } from '../../api/middleware/require-credential.js';
import type { ConnectorConfig } from '../../config/connector.js';
import { createHttpClient } from '../../lib/http-client.js';
import type { ConnectorLogger } from '../../lib/logger.js';
import { ConnectorController } from './api/connector.controller.js';
import { createTerminalRouter, createWidgetApiRouter } from './api/connector.routes.js';
import { CredentialGuard } from './services/credential-guard.service.js';
import { QueryDispatcher } from './services/query-dispatcher.service.js';
import { SchemaTranslator } from './services/schema-translator.service.js';
import { UpstreamClient, UpstreamRetryPolicy } from './services/upstream-client.service.js';

const appsManifestSchema = z.array(z.record(z.unknown()));

/**
 * Dependencies required by the connector module.
 */
export interface IConnectorModuleDependencies {
    app: Express;
    config: ConnectorConfig;
    logger: ConnectorLogger;

    /**
     * Axios instance for provider calls. Defaults to one built from the
     * provider configuration.
     */
    httpClient?: AxiosInstance;
}

/**
 * Read the terminal app layouts served at /apps.json.
 *
 * @throws Error when the file is missing or is not a JSON array of objects
 */
export async function loadAppsManifest(path: string | undefined): Promise<Array<Record<string, unknown>>> {
    if (!path) {
        return [];
    }
    const raw = await readFile(path, 'utf8');
    const parsed = appsManifestSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
        throw new Error(`Apps manifest ${path} must be a JSON array of app objects`);
    }
    return parsed.data;
}

/**
 * Terminal connector module.
 *
 * Wires the credential guard, schema translator, upstream client and query
 * dispatcher from the frozen connector configuration, then mounts the terminal
 * and structured API routers behind the credential middleware.
 */
export class ConnectorModule implements IModule<IConnectorModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'connector',
        name: 'Terminal Connector',
        version: '0.1.0',
        description: 'Widget discovery and provider-backed widget queries for the terminal'
    };

    private app?: Express;
    private guard?: CredentialGuard;
    private controller?: ConnectorController;
    private logger?: ConnectorLogger;

    /**
     * Build every service. Nothing is mounted yet.
     *
     * @throws Error when the credential is empty or the apps manifest is unreadable
     */
    async init(dependencies: IConnectorModuleDependencies): Promise<void> {
        const { config } = dependencies;
        const logger = dependencies.logger.forModule('connector');
        logger.info('Initializing connector module...');

        this.app = dependencies.app;
        this.logger = logger;
        this.guard = new CredentialGuard(config.credential);

        const http = dependencies.httpClient ?? createHttpClient({
            baseURL: config.provider.baseUrl,
            timeout: config.provider.timeoutMs
        });
        const upstream = new UpstreamClient(
            http,
            { apiKey: config.provider.apiKey, timeoutMs: config.provider.timeoutMs },
            new UpstreamRetryPolicy(config.retry),
            dependencies.logger.forModule('upstream')
        );
        const dispatcher = new QueryDispatcher(
            config.registry,
            new SchemaTranslator(),
            upstream,
            dependencies.logger.forModule('dispatcher')
        );

        const apps = await loadAppsManifest(config.appsManifestPath);
        this.controller = new ConnectorController(dispatcher, apps, logger);

        logger.info({ widgets: config.registry.size, apps: apps.length }, 'Connector module initialized');
    }

    /**
     * Mount the routers.
     *
     * @throws Error if called before init()
     */
    async run(): Promise<void> {
        if (!this.app || !this.guard || !this.controller || !this.logger) {
            throw new Error('ConnectorModule.run() called before init()');
        }

        const auth = requireCredential(this.guard, this.logger);
        this.app.use('/', createTerminalRouter(this.controller, auth));
        this.app.use('/api/widgets', createWidgetApiRouter(this.controller, auth));

        this.logger.info('Connector routers mounted at / and /api/widgets');
    }
}
