/**
 * Stochast Public API
 *
 * @module stochast
 */

import { RandomNumberGenerator } from './generators/random-number-generator.js';
import type { RandomizeOptions } from './options.js';
import {
    formatParameters,
    getParameterProperties,
    parse,
    sampleParameters,
    type CodecOptions,
} from './parameters/index.js';
import type { DistributionParameters, DistributionProperties, SampleSequence } from './stochast-types.js';

export * from './distributions/index.js';
export * from './parameters/index.js';
export { MersenneTwister, type BitGenerator } from './generators/mersenne-twister.js';
export { RandomNumberGenerator, type RangeResolution } from './generators/random-number-generator.js';
export { systemSeedSource, type SeedSource } from './generators/seed.js';
export {
    INVALID_FLOATING_RANGE_RESULTS,
    INVALID_INTEGRAL_RANGE_RESULTS,
    INT32_MAX,
    INT32_MIN,
    RANGE_POLICY_PRESETS,
    UINT32_MAX,
    resolveRandomizeOptions,
    type InvalidFloatingRangeResult,
    type InvalidIntegralRangeResult,
    type RandomizeOptions,
    type RangePolicyPreset,
    type StochastLogger,
} from './options.js';
export {
    ERROR_MESSAGES,
    InvalidOptionsError,
    NullBufferError,
    ParameterFormatError,
    RangeInversionError,
    StochastError,
    UnknownFormatError,
    ZeroWeightError,
} from './errors.js';
export * from './stochast-types.js';
export { NEARLY_ZERO, isNearlyEqual, isNearlyZero, roundToPrecision } from './stochast-utils.js';

let sharedGenerator: RandomNumberGenerator | undefined;

function defaultGenerator(): RandomNumberGenerator {
    sharedGenerator ??= new RandomNumberGenerator();
    return sharedGenerator;
}

// The Stochast Namespace Object
export const Stochast = {
    /**
     * Creates an independent generator. Pass `seed` for a reproducible one.
     */
    createGenerator: (options?: RandomizeOptions): RandomNumberGenerator => new RandomNumberGenerator(options),

    /**
     * Lazily draws `count` samples. Without a generator, a process-wide
     * system-seeded one is used.
     */
    sample: (parameters: DistributionParameters, count: number = 1, generator?: RandomNumberGenerator): SampleSequence<number> =>
        sampleParameters(generator ?? defaultGenerator(), parameters, count),

    properties: (parameters: DistributionParameters): DistributionProperties => getParameterProperties(parameters),

    parse: (text: string, options?: CodecOptions): DistributionParameters => parse(text, options),

    format: (parameters: DistributionParameters, format: string = 'g', options?: CodecOptions): string =>
        formatParameters(parameters, format, options),
};
