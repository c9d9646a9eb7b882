import type { ITextParameterSpec } from '@terminal-connector/types';

/**
 * Ticker symbol parameter shared by the stock widgets. Values are upper-cased
 * before they reach the provider path.
 */
export function symbolParam(overrides: Partial<ITextParameterSpec> = {}): ITextParameterSpec {
    return {
        name: 'symbol',
        label: 'Stock Symbol',
        type: 'text',
        description: 'Enter a stock ticker symbol (e.g., AAPL, MSFT, GOOGL)',
        required: false,
        default: 'AAPL',
        case: 'upper',
        pattern: '[A-Za-z0-9.-]{1,15}',
        ...overrides
    };
}
