import type { IGridData, IParameterSpec, IWidgetDescriptor, WidgetType } from '@terminal-connector/types';

const DEFAULT_GRID: IGridData = { w: 12, h: 8 };

export interface ITerminalParam {
    paramName: string;
    label: string;
    type: 'text' | 'number' | 'date' | 'boolean';
    value: string | number | boolean | null;
    description?: string;
    options?: Array<{ label: string; value: string }>;
}

export interface ITerminalColumnDef {
    field: string;
    headerName: string;
    cellDataType: string;
}

/**
 * Widget entry of the terminal's `widgets.json`.
 */
export interface ITerminalWidgetConfig {
    widgetId: string;
    name: string;
    description: string;
    category: string;
    type: WidgetType;
    endpoint: string;
    gridData: IGridData;
    params: ITerminalParam[];
    data?: { table: { columnsDefs: ITerminalColumnDef[] } };
}

function toTerminalParam(spec: IParameterSpec): ITerminalParam {
    const param: ITerminalParam = {
        paramName: spec.name,
        label: spec.label,
        type: spec.type === 'enum' ? 'text' : spec.type,
        value: spec.default ?? null
    };
    if (spec.description) {
        param.description = spec.description;
    }
    if (spec.type === 'enum') {
        param.options = spec.options.map(option => ({ label: option.label, value: option.value }));
    }
    return param;
}

/**
 * Build the terminal widget manifest keyed by widget id.
 *
 * Every widget points its `endpoint` at the terminal-rendered data route
 * (`data/<widgetId>`), which the terminal resolves against the backend URL.
 */
export function buildTerminalManifest(descriptors: readonly IWidgetDescriptor[]): Record<string, ITerminalWidgetConfig> {
    const manifest: Record<string, ITerminalWidgetConfig> = {};

    for (const descriptor of descriptors) {
        const entry: ITerminalWidgetConfig = {
            widgetId: descriptor.id,
            name: descriptor.name,
            description: descriptor.description,
            category: descriptor.category,
            type: descriptor.type,
            endpoint: `data/${descriptor.id}`,
            gridData: { ...(descriptor.gridData ?? DEFAULT_GRID) },
            params: descriptor.params.map(toTerminalParam)
        };

        if (descriptor.type === 'table') {
            entry.data = {
                table: {
                    columnsDefs: descriptor.columns.map(column => ({
                        field: column.field,
                        headerName: column.headerName,
                        cellDataType: column.type
                    }))
                }
            };
        }

        manifest[descriptor.id] = entry;
    }

    return manifest;
}
