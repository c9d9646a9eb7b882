/// <reference types="vitest" />

import { describe, it, expect, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import express from 'express';
import { ConnectorModule, loadAppsManifest } from '../ConnectorModule.js';
import { createConnectorConfig } from '../../../config/connector.js';
import { loadEnv } from '../../../config/env.js';
import { createLogger } from '../../../lib/logger.js';
import { widgetCatalog } from '../widgets/index.js';

const appsPath = fileURLToPath(new URL('../../../../documents/apps.json', import.meta.url));
const missingPath = fileURLToPath(new URL('../../../../documents/missing.json', import.meta.url));
const packageJsonPath = fileURLToPath(new URL('../../../../package.json', import.meta.url));

describe('loadAppsManifest', () => {
    it('should return an empty list when no path is configured', async () => {
        await expect(loadAppsManifest(undefined)).resolves.toEqual([]);
    });

    it('should load the bundled app layouts', async () => {
        const apps = await loadAppsManifest(appsPath);

        expect(apps).toHaveLength(1);
        expect(apps[0].name).toBe('Stock Overview');
    });

    it('should fail for a missing file', async () => {
        await expect(loadAppsManifest(missingPath)).rejects.toThrow();
    });

    it('should fail for JSON that is not a list of apps', async () => {
        await expect(loadAppsManifest(packageJsonPath)).rejects.toThrow(
            `Apps manifest ${packageJsonPath} must be a JSON array of app objects`
        );
    });
});

describe('ConnectorModule', () => {
    const logger = createLogger({ level: 'silent', pretty: false });

    it('should expose module metadata', () => {
        expect(new ConnectorModule().metadata).toMatchObject({ id: 'connector', name: 'Terminal Connector' });
    });

    it('should refuse to run before init', async () => {
        await expect(new ConnectorModule().run()).rejects.toThrow('ConnectorModule.run() called before init()');
    });

    it('should fail init when the apps manifest cannot be read', async () => {
        const env = loadEnv({ CONNECTOR_API_KEY: 'test-secret', APPS_MANIFEST_PATH: missingPath });
        const config = createConnectorConfig(env, widgetCatalog);

        await expect(new ConnectorModule().init({ app: express(), config, logger })).rejects.toThrow();
    });

    it('should mount its routers on run', async () => {
        const env = loadEnv({ CONNECTOR_API_KEY: 'test-secret', APPS_MANIFEST_PATH: appsPath });
        const config = createConnectorConfig(env, widgetCatalog);
        const app = express();
        const use = vi.spyOn(app, 'use');

        const connector = new ConnectorModule();
        await connector.init({ app, config, logger });
        expect(use).not.toHaveBeenCalled();

        await connector.run();

        expect(use).toHaveBeenCalledTimes(2);
        expect(use).toHaveBeenCalledWith('/', expect.any(Function));
        expect(use).toHaveBeenCalledWith('/api/widgets', expect.any(Function));
    });
});
