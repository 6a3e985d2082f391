import type { RandomNumberGenerator } from '../generators/random-number-generator.js';
import { INT32_MAX, INT32_MIN, UINT32_MAX, type InvalidFloatingRangeResult } from '../options.js';
import type { DistributionProperties, SampleSequence } from '../stochast-types.js';
import { clamp, square } from '../stochast-utils.js';
import { NAN_PROPERTIES, createProperties, drawSequence, sampleCount } from './sequence.js';

export interface UniformSampleOptions {
    minimum?: number | null;
    maximum?: number | null;
}

export interface ContinuousUniformSampleOptions extends UniformSampleOptions {
    /** Overrides the generator's `invalidFloatingRange`. */
    invalidRange?: InvalidFloatingRangeResult;
}

/**
 * Continuous bounds with a missing side filled in. With both absent the range
 * is [0, 1); with one absent the range keeps that unit width on the side of
 * the bound that is present.
 */
export function continuousUniformBounds(minimum?: number | null, maximum?: number | null): [number, number] {
    if (minimum === null || minimum === undefined) {
        return maximum === null || maximum === undefined ? [0, 1] : [maximum - 1, maximum];
    }
    return [minimum, maximum ?? minimum + 1];
}

/** Clamps integral bounds into `[lowest, highest]`, filling absent ones with those limits. */
function integralBounds(
    minimum: number | null | undefined,
    maximum: number | null | undefined,
    lowest: number,
    highest: number
): [number, number] {
    return [
        clamp(Math.trunc(minimum ?? lowest), lowest, highest),
        clamp(Math.trunc(maximum ?? highest), lowest, highest),
    ];
}

function discreteProperties(min: number, max: number): DistributionProperties {
    if (min > max) {
        [min, max] = [max, min];
    }
    const width = max - min + 1;
    return createProperties({
        maximum: max,
        mean: (min + max) / 2,
        median: (min + max) / 2,
        minimum: min,
        mode: [Number.NaN],
        variance: (square(width) - 1) / 12,
    });
}

/**
 * Real values in [minimum, maximum). Absent bounds follow {@link continuousUniformBounds}.
 */
export class ContinuousUniformDistribution {
    static getProperties(min?: number | null, max?: number | null): DistributionProperties {
        const [minimum, maximum] = continuousUniformBounds(min, max);
        if (Number.isNaN(minimum) || Number.isNaN(maximum)) {
            return NAN_PROPERTIES;
        }
        const lo = Math.min(minimum, maximum);
        const hi = Math.max(minimum, maximum);
        return createProperties({
            maximum: hi,
            mean: (lo + hi) / 2,
            median: (lo + hi) / 2,
            minimum: lo,
            mode: [Number.NaN],
            variance: square(hi - lo) / 12,
        });
    }

    static samples(
        generator: RandomNumberGenerator,
        count: number = 1,
        options: ContinuousUniformSampleOptions = {}
    ): SampleSequence<number> {
        const [min, max] = continuousUniformBounds(options.minimum, options.maximum);
        const policy = options.invalidRange ?? generator.invalidFloatingRange;
        return drawSequence(() => generator.nextDoubleInRange(min, max, policy), sampleCount(count));
    }
}

/**
 * Signed 32-bit integers in [minimum, maximum], both inclusive. Bounds are
 * clamped into the signed 32-bit range, which absent bounds default to.
 */
export class DiscreteUniformSignedDistribution {
    static getProperties(minimum?: number | null, maximum?: number | null): DistributionProperties {
        return discreteProperties(...integralBounds(minimum, maximum, INT32_MIN, INT32_MAX));
    }

    static samples(
        generator: RandomNumberGenerator,
        count: number = 1,
        options: UniformSampleOptions = {}
    ): SampleSequence<number> {
        const [min, max] = integralBounds(options.minimum, options.maximum, INT32_MIN, INT32_MAX);
        return drawSequence(() => generator.nextIntInclusive(min, max), sampleCount(count));
    }
}

/**
 * Unsigned 32-bit integers in [minimum, maximum], both inclusive. Bounds are
 * clamped into [0, 2^32 - 1], which absent bounds default to.
 */
export class DiscreteUniformUnsignedDistribution {
    static getProperties(minimum?: number | null, maximum?: number | null): DistributionProperties {
        return discreteProperties(...integralBounds(minimum, maximum, 0, UINT32_MAX));
    }

    static samples(
        generator: RandomNumberGenerator,
        count: number = 1,
        options: UniformSampleOptions = {}
    ): SampleSequence<number> {
        const [min, max] = integralBounds(options.minimum, options.maximum, 0, UINT32_MAX);
        return drawSequence(() => generator.nextUIntInclusive(min, max), sampleCount(count));
    }
}
