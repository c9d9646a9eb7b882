import type { IWidgetDescriptor } from '@terminal-connector/types';
import { symbolParam } from './symbol.param.js';

/**
 * Daily moving averages over the last N days, one row per provider record.
 */
export const stockHistoryWidget: IWidgetDescriptor = {
    id: 'stock_history',
    name: 'Stock Price History',
    description: 'Daily 50-day and 200-day moving averages',
    category: 'Stock Data',
    type: 'table',
    gridData: { w: 20, h: 10 },
    params: [
        symbolParam(),
        {
            name: 'days',
            label: 'Days',
            type: 'number',
            description: 'Number of trading days to return',
            required: false,
            default: 30,
            integer: true,
            min: 1,
            max: 365
        }
    ],
    columns: [
        { field: 'date', headerName: 'Date', type: 'date' },
        { field: 'symbol', headerName: 'Symbol', type: 'text' },
        { field: 'ma50', headerName: '50-Day MA', type: 'number', source: 'day50MovingAverage' },
        { field: 'ma200', headerName: '200-Day MA', type: 'number', source: 'day200MovingAverage' },
        { field: 'week52Change', headerName: '52-Week Change', type: 'number', source: '52weekChange' }
    ],
    source: {
        kind: 'provider',
        path: '/data/CORE/STOCK_STATS_US/{symbol}',
        query: { last: { param: 'days' } }
    }
};
