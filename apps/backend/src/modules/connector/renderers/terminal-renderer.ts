import type { ITranslatedResponse, IWidgetDescriptor, TranslatedRow } from '@terminal-connector/types';
import { formatMetricValue } from './metric-format.js';

/**
 * One entry of a metric widget payload as the terminal expects it.
 */
export interface ITerminalMetric {
    label: string;
    value: string;
    delta?: string;
    description?: string;
}

export type TerminalPayload = readonly TranslatedRow[] | ITerminalMetric[] | string;

/**
 * Render the first row of a translated response as a list of metrics, one per
 * visible column with a value.
 */
export function renderMetrics(descriptor: IWidgetDescriptor, response: ITranslatedResponse): ITerminalMetric[] {
    const [row] = response.rows;
    if (!row) {
        return [];
    }

    const metrics: ITerminalMetric[] = [];
    for (const column of descriptor.columns) {
        const value = row[column.field];
        const presentation = column.presentation ?? {};
        if (value === null || value === undefined || presentation.hidden) {
            continue;
        }

        const metric: ITerminalMetric = {
            label: column.headerName,
            value: formatMetricValue(value, presentation.format)
        };
        if (presentation.delta && typeof value === 'number') {
            metric.delta = value.toFixed(4);
        }
        if (presentation.dateColumn) {
            metric.description = `Date: ${row[presentation.dateColumn] ?? 'N/A'}`;
        } else if (presentation.description) {
            metric.description = presentation.description;
        }
        metrics.push(metric);
    }

    return metrics;
}

/**
 * Markdown widgets carry their document in the first column of the first row.
 */
export function renderMarkdown(descriptor: IWidgetDescriptor, response: ITranslatedResponse): string {
    const [row] = response.rows;
    const [column] = descriptor.columns;
    if (!row || !column) {
        return '';
    }
    const value = row[column.field];
    return value === null || value === undefined ? '' : String(value);
}

/**
 * Shape a translated response the way the terminal renders the widget type.
 */
export function renderForTerminal(descriptor: IWidgetDescriptor, response: ITranslatedResponse): TerminalPayload {
    switch (descriptor.type) {
        case 'metric':
            return renderMetrics(descriptor, response);
        case 'markdown':
            return renderMarkdown(descriptor, response);
        case 'table':
            return response.rows;
    }
}
