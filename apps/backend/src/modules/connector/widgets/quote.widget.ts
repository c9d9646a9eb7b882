import type { IWidgetDescriptor } from '@terminal-connector/types';
import { symbolParam } from './symbol.param.js';

/**
 * Latest quote from the provider's `EDGE/VNX_QUOTE` dataset.
 */
export const quoteWidget: IWidgetDescriptor = {
    id: 'quote',
    name: 'Quote',
    description: 'Latest bid, ask and trade for a symbol',
    category: 'Stock Data',
    type: 'table',
    gridData: { w: 20, h: 6 },
    params: [symbolParam({ required: true, default: undefined })],
    columns: [
        { field: 'symbol', headerName: 'Symbol', type: 'text', source: 'vnxSymbol' },
        { field: 'price', headerName: 'Price', type: 'number', source: 'vnxPrice' },
        { field: 'bidPrice', headerName: 'Bid', type: 'number', source: 'vnxBidPrice' },
        { field: 'bidSize', headerName: 'Bid Size', type: 'number', source: 'vnxBidSize' },
        { field: 'askPrice', headerName: 'Ask', type: 'number', source: 'vnxAskPrice' },
        { field: 'askSize', headerName: 'Ask Size', type: 'number', source: 'vnxAskSize' },
        { field: 'lastSalePrice', headerName: 'Last Sale', type: 'number', source: 'vnxLastSalePrice' },
        { field: 'open', headerName: 'Open', type: 'number', source: 'vnxOpenPrice' },
        { field: 'high', headerName: 'High', type: 'number', source: 'vnxHighPrice' },
        { field: 'low', headerName: 'Low', type: 'number', source: 'vnxLowPrice' },
        { field: 'close', headerName: 'Close', type: 'number', source: 'vnxClosePrice' },
        { field: 'volume', headerName: 'Volume', type: 'number', source: 'vnxVolume' },
        { field: 'date', headerName: 'Date', type: 'date', source: 'vnxTimestamp' }
    ],
    source: {
        kind: 'provider',
        path: '/data/EDGE/VNX_QUOTE/{symbol}',
        query: { last: 1 }
    }
};
