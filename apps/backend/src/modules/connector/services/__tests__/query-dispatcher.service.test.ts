/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { IParameterSpec, IProviderResponse, IUpstreamRequest } from '@terminal-connector/types';
import { QueryDispatcher } from '../query-dispatcher.service.js';
import { SchemaTranslator } from '../schema-translator.service.js';
import type { UpstreamGateway } from '../upstream-client.service.js';
import { WidgetRegistry } from '../../registry/widget-registry.js';
import { widgetCatalog } from '../../widgets/index.js';
import { UnknownWidgetError, UpstreamTimeoutError, ValidationError } from '../../../../lib/errors.js';
import { createMockLogger } from '../../../../tests/vitest/mocks/logger.js';

/**
 * Upstream gateway spy. Records every request it is asked to send.
 */
class SpyGateway implements UpstreamGateway {
    readonly requests: IUpstreamRequest[] = [];
    response: IProviderResponse = { status: 200, payload: [] };
    failure?: Error;

    call = vi.fn(async (request: IUpstreamRequest, _signal?: AbortSignal): Promise<IProviderResponse> => {
        this.requests.push(request);
        if (this.failure) {
            throw this.failure;
        }
        return this.response;
    });
}

/**
 * A value the terminal could send for a discovered parameter: the declared
 * default, otherwise a valid sample of the declared type, as query-string text.
 */
function sampleValue(spec: IParameterSpec): string {
    if (spec.default !== undefined) {
        return String(spec.default);
    }
    switch (spec.type) {
        case 'text':
            return 'ABG';
        case 'number':
            return String(spec.min ?? 1);
        case 'date':
            return '2025-03-14';
        case 'enum':
            return spec.options[0]?.value ?? '';
        case 'boolean':
            return 'true';
    }
}

describe('QueryDispatcher', () => {
    let gateway: SpyGateway;
    let dispatcher: QueryDispatcher;

    beforeEach(() => {
        gateway = new SpyGateway();
        dispatcher = new QueryDispatcher(
            new WidgetRegistry(widgetCatalog),
            new SchemaTranslator(),
            gateway,
            createMockLogger()
        );
    });

    it('should describe every widget in catalog order', () => {
        const widgets = dispatcher.describeWidgets();

        expect(widgets.map(widget => widget.id)).toEqual(['stock_stats', 'stock_history', 'quote', 'hello_world']);
        expect(widgets[2].params[0]).toMatchObject({ name: 'symbol', type: 'text', required: true });
    });

    it('should query the provider and translate the payload', async () => {
        gateway.response = { status: 200, payload: [{ vnxSymbol: 'ABG', vnxPrice: 231.4 }] };

        const result = await dispatcher.query({ widgetId: 'quote', params: { symbol: 'abg' } });

        expect(gateway.requests).toEqual([
            { widgetId: 'quote', method: 'GET', path: '/data/EDGE/VNX_QUOTE/ABG', query: { last: '1' } }
        ]);
        expect(result.rows[0].symbol).toBe('ABG');
        expect(result.rows[0].price).toBe(231.4);
    });

    it('should pass the abort signal to the gateway', async () => {
        const controller = new AbortController();

        await dispatcher.query({ widgetId: 'quote', params: { symbol: 'ABG' } }, controller.signal);

        expect(gateway.call).toHaveBeenCalledWith(expect.objectContaining({ widgetId: 'quote' }), controller.signal);
    });

    it('should reject unknown widgets before any upstream call', async () => {
        await expect(dispatcher.query({ widgetId: 'options_chain', params: {} })).rejects.toBeInstanceOf(UnknownWidgetError);
        expect(gateway.call).not.toHaveBeenCalled();
    });

    it('should reject invalid parameters before any upstream call', async () => {
        await expect(dispatcher.query({ widgetId: 'quote', params: {} })).rejects.toBeInstanceOf(ValidationError);
        expect(gateway.call).not.toHaveBeenCalled();
    });

    it('should return the same column shape for repeated queries', async () => {
        gateway.response = { status: 200, payload: [{ vnxSymbol: 'ABG' }] };
        const first = await dispatcher.query({ widgetId: 'quote', params: { symbol: 'ABG' } });

        gateway.response = { status: 200, payload: [] };
        const second = await dispatcher.query({ widgetId: 'quote', params: { symbol: 'ABG' } });

        expect(second.columns).toEqual(first.columns);
    });

    it('should propagate upstream failures', async () => {
        gateway.failure = new UpstreamTimeoutError();

        await expect(dispatcher.query({ widgetId: 'stock_stats', params: {} })).rejects.toBeInstanceOf(UpstreamTimeoutError);
    });

    it('should accept every discovered parameter schema filled with valid values', async () => {
        for (const widget of dispatcher.describeWidgets()) {
            const params = Object.fromEntries(widget.params.map(spec => [spec.name, sampleValue(spec)]));

            const result = await dispatcher.query({ widgetId: widget.id, params });

            expect(result.widgetId).toBe(widget.id);
            expect(result.columns.map(column => column.field)).toEqual(widget.columns.map(column => column.field));
        }
        expect(gateway.requests.map(request => request.widgetId)).toEqual(['stock_stats', 'stock_history', 'quote']);
    });

    it('should serve local widgets without the provider', async () => {
        const result = await dispatcher.query({ widgetId: 'hello_world', params: { name: 'Ada' } });

        expect(result.rows).toEqual([{ content: '# Hello World Ada' }]);
        expect(gateway.call).not.toHaveBeenCalled();
    });
});
