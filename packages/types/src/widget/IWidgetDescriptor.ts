import type { IColumnMetadata, IColumnSpec } from './IColumnSpec.js';
import type { IParameterSpec, ResolvedParameters } from './IParameterSpec.js';

/**
 * How the terminal renders a widget's payload.
 */
export type WidgetType = 'table' | 'metric' | 'markdown';

/**
 * Reference from a provider query value to a declared widget parameter.
 */
export interface IParameterReference {
    param: string;
}

/**
 * Upstream provider endpoint a widget queries.
 *
 * @example
 * ```typescript
 * {
 *     kind: 'provider',
 *     path: '/data/CORE/STOCK_STATS_US/{symbol}',
 *     query: { last: 1 }
 * }
 * ```
 */
export interface IProviderSource {
    kind: 'provider';

    /**
     * Path relative to the provider base URL. `{name}` placeholders are
     * replaced by the URL-encoded value of the parameter with that name.
     */
    path: string;

    /**
     * Query string mapping. Constants are sent verbatim; parameter references
     * are omitted when the optional parameter has no value.
     */
    query?: Readonly<Record<string, string | number | IParameterReference>>;
}

/**
 * Widget payload computed in-process without calling the provider.
 */
export interface ILocalSource {
    kind: 'local';
    produce(params: ResolvedParameters): unknown;
}

export type WidgetSource = IProviderSource | ILocalSource;

/**
 * Layout hint for the terminal grid.
 */
export interface IGridData {
    w: number;
    h: number;
}

/**
 * Static definition of a widget the connector exposes.
 *
 * Descriptors are declared in the widget catalog, validated and frozen once
 * when the registry is built, and read-only thereafter.
 */
export interface IWidgetDescriptor {
    /**
     * Unique widget id. Also the terminal endpoint name.
     */
    id: string;
    name: string;
    description: string;
    category: string;
    type: WidgetType;
    gridData?: IGridData;
    params: readonly IParameterSpec[];
    columns: readonly IColumnSpec[];
    source: WidgetSource;
}

/**
 * Discovery view of a widget: everything the terminal needs to render and
 * query it, without the provider mapping.
 */
export interface IWidgetManifestEntry {
    id: string;
    name: string;
    description: string;
    category: string;
    type: WidgetType;
    params: readonly IParameterSpec[];
    columns: readonly IColumnMetadata[];
}
