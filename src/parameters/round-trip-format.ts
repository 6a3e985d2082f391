/**
 * Round-trip ("r") grammar:
 *
 *   <kind>:<minimum>;<maximum>:<shape0>[;<shape1>...]:<precision>
 *
 * Numbers use the shortest decimal that reads back bit-identical, with the
 * tokens `Infinity`, `-Infinity` and `NaN`; `-0` keeps its sign. An absent
 * minimum is written `-Infinity`, an absent maximum `Infinity`, an absent
 * precision as the empty string. No locale is ever consulted.
 */

import { StochastError } from '../errors.js';
import type { DistributionParameters } from '../stochast-types.js';
import { fromShapeValues, isDistributionType, shapeValues } from './parameters.js';

const FIELD_SEPARATOR = ':';
const VALUE_SEPARATOR = ';';

const DECIMAL_TOKEN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const PRECISION_TOKEN = /^\d{1,3}$/;

export function formatRoundTripNumber(value: number): string {
    return Object.is(value, -0) ? '-0' : String(value);
}

export function parseRoundTripNumber(token: string): number | null {
    switch (token) {
        case 'NaN':
            return Number.NaN;
        case 'Infinity':
        case '+Infinity':
            return Number.POSITIVE_INFINITY;
        case '-Infinity':
            return Number.NEGATIVE_INFINITY;
    }
    return DECIMAL_TOKEN.test(token) ? Number(token) : null;
}

export function formatRoundTrip(parameters: DistributionParameters): string {
    const minimum = formatRoundTripNumber(parameters.minimum ?? Number.NEGATIVE_INFINITY);
    const maximum = formatRoundTripNumber(parameters.maximum ?? Number.POSITIVE_INFINITY);
    const shape = shapeValues(parameters).map(formatRoundTripNumber).join(VALUE_SEPARATOR);
    const precision = parameters.precision === null ? '' : String(parameters.precision);
    return [String(parameters.type), `${minimum}${VALUE_SEPARATOR}${maximum}`, shape, precision].join(FIELD_SEPARATOR);
}

function parseValueList(field: string): number[] | null {
    if (field === '') return [];
    const values: number[] = [];
    for (const token of field.split(VALUE_SEPARATOR)) {
        const value = parseRoundTripNumber(token);
        if (value === null) return null;
        values.push(value);
    }
    return values;
}

/**
 * Reads a round-trip string. Returns `null` for anything malformed,
 * including values the parameter constructors reject.
 */
export function parseRoundTrip(text: string): DistributionParameters | null {
    const fields = text.trim().split(FIELD_SEPARATOR);
    if (fields.length !== 4) return null;
    const [kindField, boundsField, shapeField, precisionField] = fields;

    if (!PRECISION_TOKEN.test(kindField)) return null;
    const type = Number(kindField);
    if (!isDistributionType(type)) return null;

    const bounds = boundsField.split(VALUE_SEPARATOR);
    if (bounds.length !== 2) return null;
    const minimum = parseRoundTripNumber(bounds[0]);
    const maximum = parseRoundTripNumber(bounds[1]);
    if (minimum === null || maximum === null) return null;

    const shape = parseValueList(shapeField);
    if (shape === null) return null;

    let precision: number | null = null;
    if (precisionField !== '') {
        if (!PRECISION_TOKEN.test(precisionField)) return null;
        precision = Number(precisionField);
    }

    try {
        return fromShapeValues(type, shape, { minimum, maximum, precision });
    } catch (err) {
        if (err instanceof StochastError) return null;
        throw err;
    }
}
