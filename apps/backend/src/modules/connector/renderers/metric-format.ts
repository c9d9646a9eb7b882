import type { CellValue, ColumnFormat } from '@terminal-connector/types';

/**
 * Abbreviate a large count: `1.20B`, `19.44M`, `180.73K`. Values under a
 * thousand are printed as-is.
 */
export function formatCompact(value: number): string {
    const magnitude = Math.abs(value);
    if (magnitude >= 1_000_000_000) {
        return `${(value / 1_000_000_000).toFixed(2)}B`;
    }
    if (magnitude >= 1_000_000) {
        return `${(value / 1_000_000).toFixed(2)}M`;
    }
    if (magnitude >= 1_000) {
        return `${(value / 1_000).toFixed(2)}K`;
    }
    return value.toLocaleString('en-US');
}

/**
 * Ratio as a signed percentage: `-0.19` becomes `-19.00%`, `0.05` becomes `+5.00%`.
 */
export function formatPercent(ratio: number): string {
    const percent = ratio * 100;
    const sign = percent >= 0 ? '+' : '';
    return `${sign}${percent.toFixed(2)}%`;
}

export function formatMetricValue(value: Exclude<CellValue, null>, format: ColumnFormat = 'plain'): string {
    if (typeof value !== 'number') {
        return String(value);
    }

    switch (format) {
        case 'currency':
            return `$${value.toFixed(2)}`;
        case 'percent':
            return formatPercent(value);
        case 'compact':
            return formatCompact(value);
        case 'decimal':
            return value.toFixed(2);
        case 'plain':
            return String(value);
    }
}
