import { z } from 'zod';
import { ERROR_MESSAGES, ParameterFormatError } from '../errors.js';
import type { DistributionParameters } from '../stochast-types.js';
import { formatParameters, tryParseExact } from './codec.js';
import { isDistributionType } from './parameters.js';

/**
 * A JSON string field holding a round-trip parameter string, parsed into
 * {@link DistributionParameters}.
 */
export const DistributionParametersJson = z.string().transform((text, ctx): DistributionParameters => {
    const result = tryParseExact(text, 'r');
    if (!result.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: ERROR_MESSAGES.INVALID_FORMAT });
        return z.NEVER;
    }
    return result.value;
});

export function isDistributionParameters(value: unknown): value is DistributionParameters {
    return typeof value === 'object'
        && value !== null
        && 'type' in value
        && typeof value.type === 'number'
        && isDistributionType(value.type)
        && 'minimum' in value
        && 'maximum' in value
        && 'precision' in value;
}

type JsonReplacer = (this: unknown, key: string, value: unknown) => unknown;

/**
 * `JSON.stringify` replacer writing parameter values as round-trip strings.
 * With `keys`, only properties of those names are converted.
 */
export function parametersReplacer(keys?: readonly string[]): JsonReplacer {
    return (key, value) => {
        if (keys && !keys.includes(key)) return value;
        return isDistributionParameters(value) ? formatParameters(value, 'r') : value;
    };
}

/**
 * `JSON.parse` reviver reading round-trip strings under `keys` back into
 * parameter values.
 *
 * @throws ParameterFormatError when such a property holds a malformed string
 */
export function parametersReviver(keys: readonly string[]): JsonReplacer {
    return (key, value) => {
        if (!keys.includes(key) || typeof value !== 'string') return value;
        const parsed = DistributionParametersJson.safeParse(value);
        if (!parsed.success) {
            throw new ParameterFormatError(value);
        }
        return parsed.data;
    };
}
