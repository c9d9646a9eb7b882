/// <reference types="vitest" />

import { describe, it, expect, afterEach, vi } from 'vitest';
import http from 'node:http';
import axios, { type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { createConnectorConfig } from '../../src/config/connector.js';
import { loadEnv } from '../../src/config/env.js';
import { createLogger } from '../../src/lib/logger.js';
import { createExpressApp, finalizeExpressApp } from '../../src/loaders/express.js';
import { ConnectorModule, widgetCatalog } from '../../src/modules/connector/index.js';
import { createStubProvider, jsonReply, type StubProvider, type StubReply } from '../../src/tests/vitest/mocks/provider.js';

const CREDENTIAL = 'test-secret';

interface RunningConnector {
    baseUrl: string;
    provider: StubProvider;
    close(): Promise<void>;
}

let running: RunningConnector | undefined;

/**
 * Boot the full connector (middleware, module, error handler) on an ephemeral
 * port with the provider replaced by an in-process stub.
 */
async function startConnector(replies: StubReply[] = [jsonReply([])]): Promise<RunningConnector> {
    const env = loadEnv({
        CONNECTOR_API_KEY: CREDENTIAL,
        PROVIDER_API_KEY: 'test-token',
        UPSTREAM_BACKOFF_MS: '1',
        UPSTREAM_TIMEOUT_MS: '200'
    });
    const config = createConnectorConfig(env, widgetCatalog);
    const logger = createLogger({ level: 'silent', pretty: false });
    const provider = createStubProvider(replies);

    const app = createExpressApp({ config, logger, accessLog: false });
    const connector = new ConnectorModule();
    await connector.init({ app, config, logger, httpClient: provider.http });
    await connector.run();
    finalizeExpressApp(app, logger);

    const server = http.createServer(app);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
        throw new Error('Server did not bind a TCP port');
    }
    const { port } = address;

    running = {
        baseUrl: `http://127.0.0.1:${port}`,
        provider,
        close: () => new Promise<void>((resolve, reject) => {
            server.closeAllConnections();
            server.close(error => (error ? reject(error) : resolve()));
        })
    };
    return running;
}

function request(connector: RunningConnector, path: string, config: AxiosRequestConfig = {}): Promise<AxiosResponse> {
    return axios.request({
        url: `${connector.baseUrl}${path}`,
        method: 'GET',
        validateStatus: () => true,
        ...config
    });
}

const withKey = { headers: { 'X-API-Key': CREDENTIAL } };

describe('connector HTTP surface', () => {
    afterEach(async () => {
        await running?.close();
        running = undefined;
    });

    describe('public routes', () => {
        it('should serve service info and health without a credential', async () => {
            const connector = await startConnector();

            const root = await request(connector, '/');
            const health = await request(connector, '/api/health');

            expect(root.status).toBe(200);
            expect(root.data).toEqual({ info: 'Terminal connector backend', widgets: 4 });
            expect(health.status).toBe(200);
            expect(health.data.status).toBe('ok');
        });

        it('should echo a well-formed request id and replace others', async () => {
            const connector = await startConnector();

            const kept = await request(connector, '/api/health', { headers: { 'x-request-id': 'req-123' } });
            const replaced = await request(connector, '/api/health', { headers: { 'x-request-id': 'not an id!' } });

            expect(kept.headers['x-request-id']).toBe('req-123');
            expect(replaced.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
        });

        it('should answer unknown routes with a JSON 404', async () => {
            const connector = await startConnector();

            const response = await request(connector, '/api/unknown');

            expect(response.status).toBe(404);
            expect(response.data).toEqual({
                success: false,
                error: { kind: 'NOT_FOUND', message: 'No route for GET /api/unknown' }
            });
        });

        it('should allow configured terminal origins only', async () => {
            const connector = await startConnector();

            const allowed = await request(connector, '/', { headers: { Origin: 'https://pro.openbb.co' } });
            const denied = await request(connector, '/', { headers: { Origin: 'https://elsewhere.test' } });

            expect(allowed.headers['access-control-allow-origin']).toBe('https://pro.openbb.co');
            expect(denied.headers['access-control-allow-origin']).toBeUndefined();
        });
    });

    describe('credential', () => {
        it('should reject discovery without a credential and reveal no widgets', async () => {
            const connector = await startConnector();

            const response = await request(connector, '/widgets.json');

            expect(response.status).toBe(401);
            expect(response.data).toEqual({ success: false, error: { kind: 'UNAUTHORIZED', message: 'Unauthorized' } });
        });

        it('should reject a wrong credential with the same body', async () => {
            const connector = await startConnector();

            const response = await request(connector, '/api/widgets', { headers: { 'X-API-Key': 'wrong-secret' } });

            expect(response.status).toBe(401);
            expect(response.data).toEqual({ success: false, error: { kind: 'UNAUTHORIZED', message: 'Unauthorized' } });
        });

        it('should reject queries before any upstream call', async () => {
            const connector = await startConnector();

            const response = await request(connector, '/api/widgets/quote/query?symbol=ABG');

            expect(response.status).toBe(401);
            expect(connector.provider.calls).toHaveLength(0);
        });

        it('should accept a bearer token', async () => {
            const connector = await startConnector();

            const response = await request(connector, '/widgets.json', { headers: { Authorization: `Bearer ${CREDENTIAL}` } });

            expect(response.status).toBe(200);
            expect(Object.keys(response.data)).toEqual(['stock_stats', 'stock_history', 'quote', 'hello_world']);
        });

        it('should reject an unauthenticated body before parsing it', async () => {
            const connector = await startConnector();
            const malformed = {
                method: 'POST',
                data: '{bad',
                headers: { 'Content-Type': 'application/json' },
                transformRequest: [(data: unknown) => data]
            };

            const query = await request(connector, '/api/widgets/quote/query', malformed);
            const data = await request(connector, '/data/quote', malformed);

            expect(query.status).toBe(401);
            expect(query.data.error.kind).toBe('UNAUTHORIZED');
            expect(data.status).toBe(401);
            expect(data.data.error.kind).toBe('UNAUTHORIZED');
        });

        it('should ignore credentials in the query string', async () => {
            const connector = await startConnector();

            const response = await request(connector, `/api/widgets?apiKey=${CREDENTIAL}`);

            expect(response.status).toBe(401);
        });
    });

    describe('discovery', () => {
        it('should list widgets with their parameters and columns', async () => {
            const connector = await startConnector();

            const response = await request(connector, '/api/widgets', withKey);

            expect(response.status).toBe(200);
            expect(response.data.widgets.map((widget: { id: string }) => widget.id)).toEqual([
                'stock_stats',
                'stock_history',
                'quote',
                'hello_world'
            ]);
        });

        it('should serve an empty apps list when no manifest is configured', async () => {
            const connector = await startConnector();

            const response = await request(connector, '/apps.json', withKey);

            expect(response.status).toBe(200);
            expect(response.data).toEqual([]);
        });
    });

    describe('queries', () => {
        it('should answer a quote query with the declared columns', async () => {
            const connector = await startConnector([jsonReply([{ vnxSymbol: 'ABG', vnxPrice: 231.4 }])]);

            const response = await request(connector, '/api/widgets/quote/query?symbol=abg', withKey);

            expect(response.status).toBe(200);
            expect(response.data.widgetId).toBe('quote');
            expect(response.data.columns[0]).toEqual({ field: 'symbol', headerName: 'Symbol', cellDataType: 'text' });
            expect(response.data.rows[0].symbol).toBe('ABG');
            expect(response.data.rows[0].price).toBe(231.4);
            expect(connector.provider.calls[0].url).toBe('/data/EDGE/VNX_QUOTE/ABG');
            expect(connector.provider.calls[0].params).toEqual({ last: '1', token: 'test-token' });
        });

        it('should reject a missing symbol naming the parameter', async () => {
            const connector = await startConnector();

            const response = await request(connector, '/api/widgets/quote/query', { ...withKey, method: 'POST', data: {} });

            expect(response.status).toBe(400);
            expect(response.data).toEqual({
                success: false,
                error: { kind: 'VALIDATION_ERROR', message: 'Missing required parameter "symbol"', field: 'symbol' }
            });
            expect(connector.provider.calls).toHaveLength(0);
        });

        it('should report unknown widgets without calling the provider', async () => {
            const connector = await startConnector();

            const response = await request(connector, '/api/widgets/options_chain/query', withKey);

            expect(response.status).toBe(404);
            expect(response.data.error).toEqual({ kind: 'UNKNOWN_WIDGET', message: 'Unknown widget "options_chain"' });
            expect(connector.provider.calls).toHaveLength(0);
        });

        it('should report a timeout after the bounded retries', async () => {
            const connector = await startConnector([{ failure: 'timeout' }]);

            const response = await request(connector, '/api/widgets/quote/query?symbol=ABG', withKey);

            expect(response.status).toBe(504);
            expect(response.data.error.kind).toBe('UPSTREAM_TIMEOUT');
            expect(connector.provider.calls).toHaveLength(3);
        });

        it('should report provider rejections as 422', async () => {
            const connector = await startConnector([jsonReply({ detail: 'Unknown symbol' }, 404)]);

            const response = await request(connector, '/api/widgets/quote/query?symbol=ZZZZ', withKey);

            expect(response.status).toBe(422);
            expect(response.data.error).toEqual({
                kind: 'UPSTREAM_REJECTED',
                message: 'Upstream provider rejected the request (404): Unknown symbol'
            });
        });

        it('should reject malformed and non-object bodies', async () => {
            const connector = await startConnector();

            const malformed = await request(connector, '/api/widgets/quote/query', {
                ...withKey,
                method: 'POST',
                data: '{"symbol":',
                headers: { ...withKey.headers, 'Content-Type': 'application/json' },
                transformRequest: [(data: unknown) => data]
            });
            const list = await request(connector, '/api/widgets/quote/query', { ...withKey, method: 'POST', data: ['ABG'] });

            expect(malformed.status).toBe(400);
            expect(malformed.data.error.message).toBe('Request body is not valid JSON');
            expect(list.status).toBe(400);
            expect(list.data.error.message).toBe('Request body must be a JSON object of widget parameters');
        });

        it('should reject bodies over the size limit', async () => {
            const connector = await startConnector();

            const response = await request(connector, '/api/widgets/quote/query', {
                ...withKey,
                method: 'POST',
                data: { symbol: 'ABG', padding: 'x'.repeat(200_000) }
            });

            expect(response.status).toBe(413);
            expect(response.data).toEqual({
                success: false,
                error: { kind: 'VALIDATION_ERROR', message: 'Request body exceeds the size limit' }
            });
            expect(connector.provider.calls).toHaveLength(0);
        });

        it('should cancel the provider call when the client disconnects', async () => {
            const connector = await startConnector([{ hang: true }]);
            const controller = new AbortController();

            const pending = request(connector, '/api/widgets/quote/query?symbol=ABG', { ...withKey, signal: controller.signal });
            await vi.waitFor(() => expect(connector.provider.calls).toHaveLength(1));
            controller.abort();

            await expect(pending).rejects.toThrow();
            await vi.waitFor(() => expect(connector.provider.calls[0].signal?.aborted).toBe(true));
        });
    });

    describe('terminal data routes', () => {
        it('should render metric widgets as metric lists', async () => {
            const connector = await startConnector([jsonReply([{ issuerName: 'Example Motors Inc', '52weekChange': -0.19 }])]);

            const response = await request(connector, '/data/stock_stats?symbol=exm', withKey);

            expect(response.status).toBe(200);
            expect(response.data).toEqual([
                { label: 'Company', value: 'Example Motors Inc' },
                { label: '52-Week Change', value: '-19.00%', delta: '-0.1900' }
            ]);
            expect(connector.provider.calls[0].url).toBe('/data/CORE/STOCK_STATS_US/EXM');
        });

        it('should render table widgets as rows', async () => {
            const connector = await startConnector([jsonReply([{ date: '2025-11-21', symbol: 'EXM', day50MovingAverage: 237.55 }])]);

            const response = await request(connector, '/data/stock_history?symbol=EXM&days=5', withKey);

            expect(response.status).toBe(200);
            expect(response.data).toEqual([
                { date: '2025-11-21', symbol: 'EXM', ma50: 237.55, ma200: null, week52Change: null }
            ]);
            expect(connector.provider.calls[0].params).toEqual({ last: '5', token: 'test-token' });
        });

        it('should render markdown widgets as a string', async () => {
            const connector = await startConnector();

            const response = await request(connector, '/data/hello_world?name=Ada', withKey);

            expect(response.status).toBe(200);
            expect(response.data).toBe('# Hello World Ada');
            expect(connector.provider.calls).toHaveLength(0);
        });
    });
});
