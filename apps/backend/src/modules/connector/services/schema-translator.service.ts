import type {
    CellValue,
    IColumnSpec,
    IProviderResponse,
    IProviderSource,
    ITranslatedResponse,
    IUpstreamRequest,
    IWidgetDescriptor,
    ParameterValue,
    ResolvedParameters,
    TranslatedRow
} from '@terminal-connector/types';
import { TranslationError, ValidationError } from '../../../lib/errors.js';
import { isAbsent, isCalendarDate, parseParameterValue } from '../validators/parameter.validator.js';

type ProviderRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ProviderRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
    if (Array.isArray(value)) {
        return 'array';
    }
    return value === null ? 'null' : typeof value;
}

function encodeValue(value: ParameterValue): string {
    return String(value.value);
}

/**
 * Translates between the terminal's widget contract and the provider's API.
 *
 * Inbound: validates raw parameters against the widget's declared specs and
 * builds the provider request. Outbound: reshapes provider payloads into rows
 * whose keys follow the widget's declared column order.
 *
 * The translator is stateless; one instance serves every request.
 */
export class SchemaTranslator {
    /**
     * Validate raw terminal parameters against a widget's declared specs.
     *
     * Unknown names are rejected, absent values fall back to the declared
     * default, and absent required values without a default are rejected.
     *
     * @throws ValidationError naming the offending parameter
     */
    resolveParameters(descriptor: IWidgetDescriptor, raw: Readonly<Record<string, unknown>>): ResolvedParameters {
        const declared = new Set(descriptor.params.map(param => param.name));
        for (const name of Object.keys(raw)) {
            if (!declared.has(name)) {
                throw new ValidationError(`Unknown parameter "${name}" for widget "${descriptor.id}"`, name);
            }
        }

        const resolved: Record<string, ParameterValue> = {};
        for (const spec of descriptor.params) {
            const value = Object.prototype.hasOwnProperty.call(raw, spec.name) ? raw[spec.name] : undefined;

            if (!isAbsent(value)) {
                resolved[spec.name] = parseParameterValue(spec, value);
            } else if (spec.default !== undefined) {
                resolved[spec.name] = parseParameterValue(spec, spec.default);
            } else if (spec.required) {
                throw new ValidationError(`Missing required parameter "${spec.name}"`, spec.name);
            }
        }

        return resolved;
    }

    /**
     * Build the provider request for a widget query.
     *
     * @param descriptor - Widget with a provider source
     * @param raw - Parameter values as received from the terminal
     * @throws ValidationError when a parameter is unknown, missing, or malformed
     */
    buildUpstreamRequest(descriptor: IWidgetDescriptor, raw: Readonly<Record<string, unknown>>): IUpstreamRequest {
        const source = descriptor.source;
        if (source.kind !== 'provider') {
            throw new Error(`Widget ${descriptor.id} is not backed by the provider`);
        }

        const params = this.resolveParameters(descriptor, raw);
        return {
            widgetId: descriptor.id,
            method: 'GET',
            path: this.buildPath(source, params),
            query: this.buildQuery(source, params)
        };
    }

    /**
     * Reshape a provider response into the widget's declared columns.
     *
     * Accepts an array of records, a single record, or (for single-column
     * widgets) a scalar. An empty payload yields zero rows with full column
     * metadata. Fields the provider omitted become `null`.
     *
     * @throws TranslationError naming the column when a value does not match its declared type
     */
    translateResponse(descriptor: IWidgetDescriptor, response: IProviderResponse): ITranslatedResponse {
        const records = this.toRecords(descriptor, response.payload);

        return {
            widgetId: descriptor.id,
            columns: descriptor.columns.map(column => ({
                field: column.field,
                headerName: column.headerName,
                cellDataType: column.type
            })),
            rows: records.map(record => this.translateRecord(descriptor.columns, record))
        };
    }

    private buildPath(source: IProviderSource, params: ResolvedParameters): string {
        return source.path.replace(/\{([^{}]+)\}/gu, (_match, name: string) => {
            const value = params[name];
            if (!value) {
                throw new Error(`Path parameter ${name} has no value`);
            }
            return encodeURIComponent(encodeValue(value));
        });
    }

    private buildQuery(source: IProviderSource, params: ResolvedParameters): Record<string, string> {
        const query: Record<string, string> = {};

        for (const [key, mapping] of Object.entries(source.query ?? {})) {
            if (typeof mapping !== 'object') {
                query[key] = String(mapping);
                continue;
            }
            const value = params[mapping.param];
            if (value) {
                query[key] = encodeValue(value);
            }
        }

        return query;
    }

    private toRecords(descriptor: IWidgetDescriptor, payload: unknown): ProviderRecord[] {
        if (payload === null || payload === undefined) {
            return [];
        }

        if (Array.isArray(payload)) {
            return payload.map((item, index) => {
                if (!isRecord(item)) {
                    throw new TranslationError(`Provider row ${index} is ${describe(item)}, expected an object`);
                }
                return item;
            });
        }

        if (isRecord(payload)) {
            return [payload];
        }

        const [onlyColumn] = descriptor.columns;
        if (descriptor.columns.length === 1 && onlyColumn) {
            return [{ [onlyColumn.source ?? onlyColumn.field]: payload }];
        }

        throw new TranslationError(`Provider returned a ${describe(payload)} where rows were expected`);
    }

    private translateRecord(columns: readonly IColumnSpec[], record: ProviderRecord): TranslatedRow {
        const row: Record<string, CellValue> = {};

        for (const column of columns) {
            const source = column.source ?? column.field;
            const raw = Object.prototype.hasOwnProperty.call(record, source) ? record[source] : undefined;
            row[column.field] = this.toCell(column, raw);
        }

        return row;
    }

    private toCell(column: IColumnSpec, raw: unknown): CellValue {
        if (raw === undefined || raw === null) {
            return null;
        }

        switch (column.type) {
            case 'text':
                if (typeof raw === 'string') {
                    return raw;
                }
                break;
            case 'number':
                if (typeof raw === 'number' && Number.isFinite(raw)) {
                    return raw;
                }
                break;
            case 'boolean':
                if (typeof raw === 'boolean') {
                    return raw;
                }
                break;
            case 'date': {
                const date = this.toIsoDate(raw);
                if (date) {
                    return date;
                }
                break;
            }
        }

        throw new TranslationError(
            `Column "${column.field}" expected ${column.type} but provider sent ${describe(raw)}`,
            column.field
        );
    }

    private toIsoDate(raw: unknown): string | null {
        if (typeof raw === 'number') {
            // Epochs outside Date's range (e.g. nanoseconds) give an invalid Date
            const date = new Date(raw);
            return Number.isNaN(date.getTime()) ? null : date.toISOString().slice(0, 10);
        }
        if (typeof raw === 'string') {
            const day = raw.slice(0, 10);
            if (isCalendarDate(day) && (raw.length === 10 || !Number.isNaN(Date.parse(raw)))) {
                return day;
            }
        }
        return null;
    }
}
