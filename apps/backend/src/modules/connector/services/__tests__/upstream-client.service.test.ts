/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import type { ILogger, IUpstreamRequest } from '@terminal-connector/types';
import { UpstreamClient, UpstreamRetryPolicy, extractProviderDetail } from '../upstream-client.service.js';
import {
    RequestAbortedError,
    UpstreamRejectedError,
    UpstreamTimeoutError,
    UpstreamUnavailableError
} from '../../../../lib/errors.js';
import { createMockLogger } from '../../../../tests/vitest/mocks/logger.js';
import { createStubProvider, jsonReply, type StubReply } from '../../../../tests/vitest/mocks/provider.js';

const request: IUpstreamRequest = {
    widgetId: 'quote',
    method: 'GET',
    path: '/data/EDGE/VNX_QUOTE/ABG',
    query: { last: '1' }
};

const fastRetries = new UpstreamRetryPolicy({ maxRetries: 2, backoffMs: 1, backoffMultiplier: 2 });

describe('UpstreamClient', () => {
    let logger: ILogger;

    beforeEach(() => {
        logger = createMockLogger();
    });

    function clientFor(replies: StubReply[], apiKey?: string) {
        const provider = createStubProvider(replies);
        const client = new UpstreamClient(provider.http, { apiKey, timeoutMs: 500 }, fastRetries, logger);
        return { provider, client };
    }

    it('should return the parsed payload and status', async () => {
        const { client } = clientFor([jsonReply([{ vnxSymbol: 'ABG' }])]);

        await expect(client.call(request)).resolves.toEqual({ status: 200, payload: [{ vnxSymbol: 'ABG' }] });
    });

    it('should send the path, query and provider token', async () => {
        const { client, provider } = clientFor([jsonReply([])], 'test-token');

        await client.call(request);

        expect(provider.calls).toHaveLength(1);
        expect(provider.calls[0].url).toBe('/data/EDGE/VNX_QUOTE/ABG');
        expect(provider.calls[0].params).toEqual({ last: '1', token: 'test-token' });
        expect(provider.calls[0].timeout).toBe(500);
    });

    it('should not send a token when none is configured', async () => {
        const { client, provider } = clientFor([jsonReply([])]);

        await client.call(request);

        expect(provider.calls[0].params).toEqual({ last: '1' });
    });

    it('should treat an empty body as a null payload', async () => {
        const { client } = clientFor([{ status: 200, body: '' }]);

        await expect(client.call(request)).resolves.toEqual({ status: 200, payload: null });
    });

    it('should retry transient failures and succeed', async () => {
        const { client, provider } = clientFor([{ status: 503, body: '' }, { failure: 'refused' }, jsonReply([])]);

        await expect(client.call(request)).resolves.toEqual({ status: 200, payload: [] });
        expect(provider.calls).toHaveLength(3);
        expect(logger.warn).toHaveBeenCalledWith(
            expect.objectContaining({ attempt: 1, maxRetries: 2, delay: 1 }),
            'Retrying upstream request'
        );
    });

    it('should give up after the bounded number of timeouts', async () => {
        const { client, provider } = clientFor([{ failure: 'timeout' }]);

        await expect(client.call(request)).rejects.toBeInstanceOf(UpstreamTimeoutError);
        expect(provider.calls).toHaveLength(3);
    });

    it('should classify 408 and 429 as unavailable', async () => {
        const throttled = clientFor([{ status: 429, body: '' }]);
        await expect(throttled.client.call(request)).rejects.toBeInstanceOf(UpstreamUnavailableError);
        expect(throttled.provider.calls).toHaveLength(3);

        const timedOut = clientFor([{ status: 408, body: '' }]);
        await expect(timedOut.client.call(request)).rejects.toBeInstanceOf(UpstreamUnavailableError);
    });

    it('should never retry a rejection and surface the provider detail', async () => {
        const { client, provider } = clientFor([jsonReply({ detail: 'Unknown symbol ZZZZ' }, 404)]);

        const error = await client.call(request).catch((reason: unknown) => reason);

        expect(error).toBeInstanceOf(UpstreamRejectedError);
        expect(error).toMatchObject({
            code: 'UPSTREAM_REJECTED',
            status: 422,
            upstreamStatus: 404,
            message: 'Upstream provider rejected the request (404): Unknown symbol ZZZZ'
        });
        expect(provider.calls).toHaveLength(1);
    });

    it('should classify malformed JSON as unavailable', async () => {
        const { client } = clientFor([{ status: 200, body: '<html>maintenance</html>' }]);

        await expect(client.call(request)).rejects.toThrow('Upstream provider returned malformed JSON');
    });

    it('should stop without retrying when the caller aborts', async () => {
        const { client, provider } = clientFor([{ hang: true }]);
        const controller = new AbortController();

        const pending = client.call(request, controller.signal);
        setTimeout(() => controller.abort(), 5);

        await expect(pending).rejects.toBeInstanceOf(RequestAbortedError);
        expect(provider.calls).toHaveLength(1);
    });

    it('should not start a request for an already aborted signal', async () => {
        const { client, provider } = clientFor([jsonReply([])]);
        const controller = new AbortController();
        controller.abort();

        await expect(client.call(request, controller.signal)).rejects.toBeInstanceOf(RequestAbortedError);
        expect(provider.calls).toHaveLength(0);
    });
});

describe('UpstreamRetryPolicy', () => {
    const policy = new UpstreamRetryPolicy();

    it('should use the default bounds', () => {
        expect(policy.maxRetries).toBe(2);
        expect(policy.delayBeforeRetry(1)).toBe(250);
        expect(policy.delayBeforeRetry(2)).toBe(500);
    });

    it('should retry only transient upstream failures', () => {
        expect(policy.shouldRetry(new UpstreamTimeoutError(), request)).toBe(true);
        expect(policy.shouldRetry(new UpstreamUnavailableError(), request)).toBe(true);
        expect(policy.shouldRetry(new UpstreamRejectedError(), request)).toBe(false);
        expect(policy.shouldRetry(new RequestAbortedError(), request)).toBe(false);
        expect(policy.shouldRetry(new Error('boom'), request)).toBe(false);
    });
});

describe('extractProviderDetail', () => {
    it('should read detail, message or error fields', () => {
        expect(extractProviderDetail('{"detail":"Not found"}')).toBe('Not found');
        expect(extractProviderDetail('{"message":"Bad token"}')).toBe('Bad token');
        expect(extractProviderDetail('{"error":"Invalid dataset"}')).toBe('Invalid dataset');
    });

    it('should fall back to the trimmed text', () => {
        expect(extractProviderDetail('  Forbidden  ')).toBe('Forbidden');
        expect(extractProviderDetail('')).toBeUndefined();
        expect(extractProviderDetail(undefined)).toBeUndefined();
    });
});
