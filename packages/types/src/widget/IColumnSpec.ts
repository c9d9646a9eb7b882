/**
 * Data types a translated column can carry.
 *
 * Matches the terminal's `cellDataType` vocabulary so column metadata can be
 * forwarded as-is.
 */
export type ColumnType = 'text' | 'number' | 'date' | 'boolean';

/**
 * Display format used when a column is rendered as a metric.
 *
 * - `currency`: `$312.56`
 * - `percent`: ratio rendered as signed percent (`-0.19` becomes `-19.00%`)
 * - `compact`: large counts abbreviated (`180.73K`, `19.44M`, `1.20B`)
 * - `decimal`: two decimals
 * - `plain`: value as-is
 */
export type ColumnFormat = 'currency' | 'percent' | 'compact' | 'decimal' | 'plain';

/**
 * How a column appears when its widget renders as a list of metrics.
 */
export interface IColumnPresentation {
    format?: ColumnFormat;

    /**
     * Static description line shown under the metric.
     */
    description?: string;

    /**
     * Field of another column whose value is shown as `Date: <value>` under the metric.
     */
    dateColumn?: string;

    /**
     * Emit the raw value as the metric delta (four decimals).
     */
    delta?: boolean;

    /**
     * Keep the column in tabular output but leave it out of the metric list.
     */
    hidden?: boolean;
}

/**
 * Declared output column of a widget.
 *
 * The declaration order of a widget's columns is the column order of every
 * response for that widget, regardless of provider field order.
 */
export interface IColumnSpec {
    /**
     * Output field name.
     */
    field: string;

    headerName: string;

    type: ColumnType;

    /**
     * Provider field to read. Defaults to `field`.
     */
    source?: string;

    presentation?: IColumnPresentation;
}

/**
 * Column metadata returned to the terminal alongside rows.
 */
export interface IColumnMetadata {
    field: string;
    headerName: string;
    cellDataType: ColumnType;
}
