import type { IWidgetDescriptor } from '@terminal-connector/types';
import { helloWorldWidget } from './hello-world.widget.js';
import { quoteWidget } from './quote.widget.js';
import { stockHistoryWidget } from './stock-history.widget.js';
import { stockStatsWidget } from './stock-stats.widget.js';

export { helloWorldWidget, quoteWidget, stockHistoryWidget, stockStatsWidget };

/**
 * Widgets the connector exposes, in discovery order.
 */
export const widgetCatalog: readonly IWidgetDescriptor[] = [
    stockStatsWidget,
    stockHistoryWidget,
    quoteWidget,
    helloWorldWidget
];
