import type { IColumnMetadata } from '../widget/IColumnSpec.js';

/**
 * Inbound query for one widget, as received from the terminal.
 *
 * Parameter values are raw (query string strings or JSON body values) until
 * the translator validates them.
 */
export interface IQueryRequest {
    widgetId: string;
    params: Readonly<Record<string, unknown>>;
}

/**
 * Provider call built by the translator.
 *
 * Never carries the provider token; the upstream client adds it at send time
 * so requests can be logged safely.
 */
export interface IUpstreamRequest {
    widgetId: string;
    method: 'GET';
    path: string;
    query: Readonly<Record<string, string>>;
}

/**
 * Provider reply for a single upstream request.
 */
export interface IProviderResponse {
    status: number;
    payload: unknown;

    /**
     * Provider-side error detail, when the provider sent one.
     */
    error?: string;
}

/**
 * Value of a single translated cell. `null` marks a field the provider did not send.
 */
export type CellValue = string | number | boolean | null;

export type TranslatedRow = Readonly<Record<string, CellValue>>;

/**
 * Provider data reshaped to the widget's declared columns.
 */
export interface ITranslatedResponse {
    widgetId: string;
    columns: readonly IColumnMetadata[];
    rows: readonly TranslatedRow[];
}
