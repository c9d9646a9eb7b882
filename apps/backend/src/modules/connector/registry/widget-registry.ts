import type { IParameterSpec, IWidgetDescriptor, IWidgetManifestEntry } from '@terminal-connector/types';
import { UnknownWidgetError, ValidationError } from '../../../lib/errors.js';
import { deepFreeze } from '../../../lib/freeze.js';
import { parseParameterValue } from '../validators/parameter.validator.js';

const PLACEHOLDER_PATTERN = /\{([^{}]+)\}/gu;

/**
 * Names referenced by `{name}` placeholders in a provider path template.
 */
export function pathPlaceholders(path: string): string[] {
    return Array.from(path.matchAll(PLACEHOLDER_PATTERN), match => match[1]);
}

/**
 * Read-only registry of the widgets the connector exposes.
 *
 * Built once from the widget catalog at startup. Construction validates the
 * catalog (unique ids, unique parameter and column names, provider mappings
 * that only reference declared parameters, defaults that satisfy their own
 * specs) and freezes every descriptor, so concurrent requests can share it
 * without locking.
 *
 * @example
 * ```typescript
 * const registry = new WidgetRegistry([quoteWidget, stockStatsWidget]);
 * registry.resolve('quote');   // IWidgetDescriptor
 * registry.resolve('nope');    // throws UnknownWidgetError
 * ```
 */
export class WidgetRegistry {
    private readonly widgets = new Map<string, IWidgetDescriptor>();

    /**
     * @param descriptors - Widget catalog in the order discovery should list it
     * @throws Error when the catalog is inconsistent
     */
    constructor(descriptors: readonly IWidgetDescriptor[]) {
        for (const descriptor of descriptors) {
            if (this.widgets.has(descriptor.id)) {
                throw new Error(`Widget with id ${descriptor.id} already registered`);
            }
            WidgetRegistry.assertConsistent(descriptor);
            this.widgets.set(descriptor.id, deepFreeze(descriptor));
        }
    }

    get size(): number {
        return this.widgets.size;
    }

    has(widgetId: string): boolean {
        return this.widgets.has(widgetId);
    }

    /**
     * Look up a widget by id.
     *
     * @throws UnknownWidgetError when no widget has that id
     */
    resolve(widgetId: string): IWidgetDescriptor {
        const descriptor = this.widgets.get(widgetId);
        if (!descriptor) {
            throw new UnknownWidgetError(widgetId);
        }
        return descriptor;
    }

    list(): IWidgetDescriptor[] {
        return Array.from(this.widgets.values());
    }

    /**
     * Discovery view of every widget, in catalog order.
     */
    manifest(): IWidgetManifestEntry[] {
        return this.list().map(descriptor => ({
            id: descriptor.id,
            name: descriptor.name,
            description: descriptor.description,
            category: descriptor.category,
            type: descriptor.type,
            params: descriptor.params,
            columns: descriptor.columns.map(column => ({
                field: column.field,
                headerName: column.headerName,
                cellDataType: column.type
            }))
        }));
    }

    private static assertConsistent(descriptor: IWidgetDescriptor): void {
        const id = descriptor.id;
        if (!id.trim()) {
            throw new Error('Widget id must not be empty');
        }

        const params = new Map<string, IParameterSpec>();
        for (const param of descriptor.params) {
            if (params.has(param.name)) {
                throw new Error(`Widget ${id} declares parameter ${param.name} twice`);
            }
            params.set(param.name, param);
            WidgetRegistry.assertValidDefault(id, param);
        }

        const fields = new Set<string>();
        for (const column of descriptor.columns) {
            if (fields.has(column.field)) {
                throw new Error(`Widget ${id} declares column ${column.field} twice`);
            }
            fields.add(column.field);
        }
        if (fields.size === 0) {
            throw new Error(`Widget ${id} must declare at least one column`);
        }
        for (const column of descriptor.columns) {
            const dateColumn = column.presentation?.dateColumn;
            if (dateColumn && !fields.has(dateColumn)) {
                throw new Error(`Widget ${id} column ${column.field} references unknown column ${dateColumn}`);
            }
        }

        const source = descriptor.source;
        if (source.kind !== 'provider') {
            return;
        }

        for (const name of pathPlaceholders(source.path)) {
            const param = params.get(name);
            if (!param) {
                throw new Error(`Widget ${id} path references unknown parameter ${name}`);
            }
            if (!param.required && param.default === undefined) {
                throw new Error(`Widget ${id} path parameter ${name} must be required or have a default`);
            }
        }
        for (const value of Object.values(source.query ?? {})) {
            if (typeof value === 'object' && !params.has(value.param)) {
                throw new Error(`Widget ${id} query references unknown parameter ${value.param}`);
            }
        }
    }

    private static assertValidDefault(widgetId: string, param: IParameterSpec): void {
        if (param.default === undefined) {
            return;
        }
        try {
            parseParameterValue(param, param.default);
        } catch (error) {
            const reason = error instanceof ValidationError ? error.message : String(error);
            throw new Error(`Widget ${widgetId} has an invalid default: ${reason}`);
        }
    }
}
