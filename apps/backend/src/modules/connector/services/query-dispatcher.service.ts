import type {
    ILogger,
    IQueryRequest,
    ITranslatedResponse,
    IWidgetDescriptor,
    IWidgetManifestEntry
} from '@terminal-connector/types';
import type { WidgetRegistry } from '../registry/widget-registry.js';
import type { SchemaTranslator } from './schema-translator.service.js';
import type { UpstreamGateway } from './upstream-client.service.js';

/**
 * Routes terminal queries to the widget they name.
 *
 * Order of work per query: resolve the widget, validate parameters and build
 * the provider request, call the provider (or the widget's local producer),
 * translate the payload. Each step throws its own connector error, so an
 * unknown widget or a bad parameter never reaches the network.
 */
export class QueryDispatcher {
    constructor(
        private readonly registry: WidgetRegistry,
        private readonly translator: SchemaTranslator,
        private readonly upstream: UpstreamGateway,
        private readonly logger: ILogger
    ) {}

    describeWidgets(): IWidgetManifestEntry[] {
        return this.registry.manifest();
    }

    listDescriptors(): IWidgetDescriptor[] {
        return this.registry.list();
    }

    /**
     * Look up a widget descriptor.
     *
     * @throws UnknownWidgetError
     */
    resolve(widgetId: string): IWidgetDescriptor {
        return this.registry.resolve(widgetId);
    }

    /**
     * Execute a widget query end to end.
     *
     * @param request - Widget id and raw parameters
     * @param signal - Aborted when the inbound caller disconnects
     */
    async query(request: IQueryRequest, signal?: AbortSignal): Promise<ITranslatedResponse> {
        const descriptor = this.registry.resolve(request.widgetId);

        if (descriptor.source.kind === 'local') {
            const params = this.translator.resolveParameters(descriptor, request.params);
            const payload = descriptor.source.produce(params);
            return this.translator.translateResponse(descriptor, { status: 200, payload });
        }

        const upstreamRequest = this.translator.buildUpstreamRequest(descriptor, request.params);
        this.logger.debug(
            { widgetId: descriptor.id, path: upstreamRequest.path, query: upstreamRequest.query },
            'Dispatching widget query'
        );

        const response = await this.upstream.call(upstreamRequest, signal);
        const translated = this.translator.translateResponse(descriptor, response);

        this.logger.debug({ widgetId: descriptor.id, rows: translated.rows.length }, 'Widget query translated');
        return translated;
    }
}
