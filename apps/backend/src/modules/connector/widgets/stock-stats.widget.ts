import type { IWidgetDescriptor } from '@terminal-connector/types';
import { symbolParam } from './symbol.param.js';

/**
 * Key statistics for one symbol from the provider's `CORE/STOCK_STATS_US`
 * dataset, rendered as a metric list.
 */
export const stockStatsWidget: IWidgetDescriptor = {
    id: 'stock_stats',
    name: 'Stock Statistics',
    description: 'Key stock statistics and metrics',
    category: 'Stock Data',
    type: 'metric',
    gridData: { w: 12, h: 8 },
    params: [symbolParam()],
    columns: [
        { field: 'company', headerName: 'Company', type: 'text', source: 'issuerName' },
        {
            field: 'week52High',
            headerName: '52-Week High',
            type: 'number',
            source: '52weekHigh',
            presentation: { format: 'currency', dateColumn: 'week52HighDate' }
        },
        {
            field: 'week52HighDate',
            headerName: '52-Week High Date',
            type: 'date',
            source: '52weekHighDate',
            presentation: { hidden: true }
        },
        {
            field: 'week52Low',
            headerName: '52-Week Low',
            type: 'number',
            source: '52weekLow',
            presentation: { format: 'currency', dateColumn: 'week52LowDate' }
        },
        {
            field: 'week52LowDate',
            headerName: '52-Week Low Date',
            type: 'date',
            source: '52weekLowDate',
            presentation: { hidden: true }
        },
        {
            field: 'week52Change',
            headerName: '52-Week Change',
            type: 'number',
            source: '52weekChange',
            presentation: { format: 'percent', delta: true }
        },
        {
            field: 'ytdChange',
            headerName: 'YTD Change',
            type: 'number',
            presentation: { format: 'percent', delta: true }
        },
        {
            field: 'peRatio',
            headerName: 'P/E Ratio (TTM)',
            type: 'number',
            source: 'peRatioTtm',
            presentation: { format: 'decimal' }
        },
        {
            field: 'eps',
            headerName: 'EPS (TTM)',
            type: 'number',
            source: 'epsTtm',
            presentation: { format: 'currency' }
        },
        {
            field: 'beta',
            headerName: 'Beta',
            type: 'number',
            presentation: { format: 'decimal', description: 'Volatility measure vs. market' }
        },
        {
            field: 'ma50',
            headerName: '50-Day MA',
            type: 'number',
            source: 'day50MovingAverage',
            presentation: { format: 'currency' }
        },
        {
            field: 'ma200',
            headerName: '200-Day MA',
            type: 'number',
            source: 'day200MovingAverage',
            presentation: { format: 'currency' }
        },
        {
            field: 'avgVolume30d',
            headerName: 'Avg 30-Day Volume',
            type: 'number',
            source: 'avg30DayVolume',
            presentation: { format: 'compact' }
        },
        {
            field: 'sharesOutstanding',
            headerName: 'Shares Outstanding',
            type: 'number',
            presentation: { format: 'compact' }
        }
    ],
    source: {
        kind: 'provider',
        path: '/data/CORE/STOCK_STATS_US/{symbol}',
        query: { last: 1 }
    }
};
