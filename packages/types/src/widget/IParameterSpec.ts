/**
 * Parameter types a widget can declare.
 *
 * The terminal renders a matching input control for each type, and the
 * translator validates inbound values against it before any provider call.
 */
export type ParameterType = 'text' | 'number' | 'date' | 'enum' | 'boolean';

interface IParameterSpecBase {
    /**
     * Parameter name as sent by the terminal (query string key or body field).
     */
    name: string;

    /**
     * Label shown next to the input control.
     */
    label: string;

    description?: string;

    /**
     * Whether the query fails with a validation error when the value is absent
     * and no default is declared.
     */
    required: boolean;
}

export interface ITextParameterSpec extends IParameterSpecBase {
    type: 'text';
    default?: string;

    /**
     * Case normalization applied after validation (ticker symbols are upper-cased).
     */
    case?: 'upper' | 'lower';

    /**
     * Regular expression source the trimmed value must match in full.
     */
    pattern?: string;
}

export interface INumberParameterSpec extends IParameterSpecBase {
    type: 'number';
    default?: number;
    integer?: boolean;
    min?: number;
    max?: number;
}

/**
 * Calendar date parameter in `YYYY-MM-DD` form.
 */
export interface IDateParameterSpec extends IParameterSpecBase {
    type: 'date';
    default?: string;
}

export interface IEnumOption {
    label: string;
    value: string;
}

export interface IEnumParameterSpec extends IParameterSpecBase {
    type: 'enum';
    options: readonly IEnumOption[];
    default?: string;
}

export interface IBooleanParameterSpec extends IParameterSpecBase {
    type: 'boolean';
    default?: boolean;
}

/**
 * Declared parameter of a widget, discriminated by `type`.
 */
export type IParameterSpec =
    | ITextParameterSpec
    | INumberParameterSpec
    | IDateParameterSpec
    | IEnumParameterSpec
    | IBooleanParameterSpec;

/**
 * A parameter value after boundary validation.
 *
 * Raw terminal input is never passed further than the translator; everything
 * downstream works with these tagged values.
 */
export type ParameterValue =
    | { type: 'text'; value: string }
    | { type: 'number'; value: number }
    | { type: 'date'; value: string }
    | { type: 'enum'; value: string }
    | { type: 'boolean'; value: boolean };

/**
 * Validated parameters keyed by parameter name.
 */
export type ResolvedParameters = Readonly<Record<string, ParameterValue>>;
