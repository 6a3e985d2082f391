import type { RandomNumberGenerator } from '../generators/random-number-generator.js';
import type { InvalidFloatingRangeResult } from '../options.js';
import type { DistributionProperties, SampleSequence } from '../stochast-types.js';
import { clampPositive, isNearlyZero, square } from '../stochast-utils.js';
import {
    NAN_PROPERTIES,
    constantSequence,
    createProperties,
    isOutside,
    pairSequence,
    planBounds,
    sampleCount,
} from './sequence.js';

export interface LocationScaleSampleOptions {
    /** Location. Default 0. */
    mu?: number;
    /** Scale. Default 1; values at or below zero are clamped to nearly zero. */
    sigma?: number;
    /** Inclusive lower bound, enforced by rejection. */
    minimum?: number | null;
    /** Inclusive upper bound, enforced by rejection. */
    maximum?: number | null;
    /** Overrides the generator's `invalidFloatingRange` for these bounds. */
    invalidRange?: InvalidFloatingRangeResult;
}

/**
 * Marsaglia polar method: one accepted point of the unit disc yields two
 * independent standard normal deviates, scaled by `sigma` around `mu`.
 */
export function drawNormalPair(generator: RandomNumberGenerator, mu: number, sigma: number): [number, number] {
    let u: number;
    let v: number;
    let s: number;
    do {
        u = generator.nextDouble(-1, 1);
        v = generator.nextDouble(-1, 1);
        s = square(u) + square(v);
    } while (isNearlyZero(s) || s >= 1);

    const factor = Math.sqrt(-2 * Math.log(s) / s) * sigma;
    return [mu + (u * factor), mu + (v * factor)];
}

/**
 * Draws a pair and rejects it whole if either member falls outside the bounds.
 */
export function drawBoundedPair(
    generator: RandomNumberGenerator,
    mu: number,
    sigma: number,
    minimum: number | null,
    maximum: number | null
): [number, number] {
    let pair: [number, number];
    do {
        pair = drawNormalPair(generator, mu, sigma);
    } while (isOutside(pair[0], minimum, maximum) || isOutside(pair[1], minimum, maximum));
    return pair;
}

export class NormalDistribution {
    static getProperties(mu: number = 0, sigma: number = 1): DistributionProperties {
        if (Number.isNaN(mu) || Number.isNaN(sigma)) {
            return NAN_PROPERTIES;
        }
        sigma = clampPositive(sigma);
        return createProperties({
            maximum: Number.POSITIVE_INFINITY,
            mean: mu,
            median: mu,
            minimum: Number.NEGATIVE_INFINITY,
            mode: [mu],
            variance: square(sigma),
        });
    }

    /**
     * Yields exactly `count` samples (negative counts yield none).
     *
     * NaN `mu` or `sigma` yields NaN throughout; bounds that are nearly
     * equal yield that bound throughout.
     */
    static samples(
        generator: RandomNumberGenerator,
        count: number = 1,
        options: LocationScaleSampleOptions = {}
    ): SampleSequence<number> {
        const total = sampleCount(count);
        const mu = options.mu ?? 0;
        const sigma = options.sigma ?? 1;

        if (Number.isNaN(mu) || Number.isNaN(sigma)) {
            return constantSequence(Number.NaN, total);
        }

        const plan = planBounds(
            options.minimum,
            options.maximum,
            options.invalidRange ?? generator.invalidFloatingRange,
            generator.logger
        );
        if (plan.kind === 'constant') {
            return constantSequence(plan.value, total);
        }

        const scale = clampPositive(sigma);
        const { minimum, maximum } = plan;
        return pairSequence(() => drawBoundedPair(generator, mu, scale, minimum, maximum), total);
    }
}
