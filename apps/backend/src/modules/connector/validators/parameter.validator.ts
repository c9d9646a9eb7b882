import type { IParameterSpec, ParameterValue } from '@terminal-connector/types';
import { ValidationError } from '../../../lib/errors.js';

const NUMERIC_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/u;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/u;

/**
 * True when a raw value counts as "not supplied": missing, null, or an empty
 * string (terminals send `symbol=` for a cleared input).
 */
export function isAbsent(raw: unknown): boolean {
    return raw === undefined || raw === null || (typeof raw === 'string' && raw.trim() === '');
}

/**
 * Whether `value` names a real calendar day in `YYYY-MM-DD` form.
 */
export function isCalendarDate(value: string): boolean {
    const match = DATE_PATTERN.exec(value);
    if (!match) {
        return false;
    }
    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const date = new Date(Date.UTC(year, month - 1, day));
    return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function describe(raw: unknown): string {
    if (Array.isArray(raw)) {
        return 'a list';
    }
    return raw === null ? 'null' : typeof raw;
}

/**
 * Parse one raw terminal value against its declared parameter spec.
 *
 * Query string values arrive as strings and JSON bodies may carry native
 * numbers and booleans; both are accepted, nothing else is coerced.
 *
 * @param spec - Declared parameter
 * @param raw - Value as received (must not be absent; see isAbsent)
 * @returns Tagged value ready for provider request building
 * @throws ValidationError naming the parameter when the value does not fit the spec
 */
export function parseParameterValue(spec: IParameterSpec, raw: unknown): ParameterValue {
    const name = spec.name;

    if (Array.isArray(raw)) {
        throw new ValidationError(`Parameter "${name}" must be a single value`, name);
    }

    switch (spec.type) {
        case 'text': {
            if (typeof raw !== 'string') {
                throw new ValidationError(`Parameter "${name}" must be a string, got ${describe(raw)}`, name);
            }
            const trimmed = raw.trim();
            if (spec.pattern && !new RegExp(`^(?:${spec.pattern})$`, 'u').test(trimmed)) {
                throw new ValidationError(`Parameter "${name}" has an invalid format`, name);
            }
            const value = spec.case === 'upper'
                ? trimmed.toUpperCase()
                : spec.case === 'lower' ? trimmed.toLowerCase() : trimmed;
            return { type: 'text', value };
        }

        case 'number': {
            let value: number;
            if (typeof raw === 'number') {
                value = raw;
            } else if (typeof raw === 'string' && NUMERIC_PATTERN.test(raw.trim())) {
                value = Number(raw.trim());
            } else {
                throw new ValidationError(`Parameter "${name}" must be a number`, name);
            }
            if (!Number.isFinite(value)) {
                throw new ValidationError(`Parameter "${name}" must be a finite number`, name);
            }
            if (spec.integer && !Number.isInteger(value)) {
                throw new ValidationError(`Parameter "${name}" must be an integer`, name);
            }
            if (spec.min !== undefined && value < spec.min) {
                throw new ValidationError(`Parameter "${name}" must be at least ${spec.min}`, name);
            }
            if (spec.max !== undefined && value > spec.max) {
                throw new ValidationError(`Parameter "${name}" must be at most ${spec.max}`, name);
            }
            return { type: 'number', value };
        }

        case 'date': {
            if (typeof raw !== 'string' || !isCalendarDate(raw.trim())) {
                throw new ValidationError(`Parameter "${name}" must be a date in YYYY-MM-DD format`, name);
            }
            return { type: 'date', value: raw.trim() };
        }

        case 'enum': {
            const value = typeof raw === 'string' ? raw.trim() : raw;
            const option = spec.options.find(candidate => candidate.value === value);
            if (!option) {
                const allowed = spec.options.map(candidate => candidate.value).join(', ');
                throw new ValidationError(`Parameter "${name}" must be one of: ${allowed}`, name);
            }
            return { type: 'enum', value: option.value };
        }

        case 'boolean': {
            if (typeof raw === 'boolean') {
                return { type: 'boolean', value: raw };
            }
            const normalized = typeof raw === 'string' ? raw.trim().toLowerCase() : undefined;
            if (normalized === 'true' || normalized === 'false') {
                return { type: 'boolean', value: normalized === 'true' };
            }
            throw new ValidationError(`Parameter "${name}" must be true or false`, name);
        }
    }
}
