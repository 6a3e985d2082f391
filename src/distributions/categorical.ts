import { ZeroWeightError } from '../errors.js';
import type { RandomNumberGenerator } from '../generators/random-number-generator.js';
import type { DistributionProperties, SampleSequence } from '../stochast-types.js';
import { isNearlyEqual, isNearlyZero, square } from '../stochast-utils.js';
import { createProperties, drawSequence, sampleCount } from './sequence.js';

const DEFAULT_CATEGORY_COUNT = 3;

export interface CategoricalSampleOptions {
    /**
     * Relative weights; normalized as needed, negatives count as 0.
     * Absent or empty means three equal weights.
     */
    weights?: readonly number[] | null;
    /** Without `weights`: this many equally weighted categories. */
    categories?: number;
}

/**
 * `k` equal weights (`k` below 1 counts as 1).
 */
export function uniformWeights(k: number): number[] {
    const count = Math.max(1, Math.floor(k));
    return new Array<number>(count).fill(1 / count);
}

/**
 * Whether `total` is the sum of `count` already normalized weights. Dividing
 * each weight by the total and summing again can miss 1 by up to about
 * `count` ulps, so the tolerance grows with the vector.
 */
function isUnitTotal(total: number, count: number): boolean {
    return isNearlyEqual(total, 1) || Math.abs(total - 1) <= count * Number.EPSILON;
}

/**
 * Clamps negative weights to zero and rescales to a unit sum. A vector whose
 * sum is already 1 within rounding is left unscaled, so normalizing twice
 * changes nothing.
 */
export function normalizeWeights(weights: readonly number[] | null | undefined): number[] {
    if (!weights || weights.length === 0) {
        return uniformWeights(DEFAULT_CATEGORY_COUNT);
    }

    const clamped = weights.map(w => Math.max(0, w));
    const total = clamped.reduce((sum, w) => sum + w, 0);
    if (Number.isNaN(total) || isNearlyZero(total)) {
        throw new ZeroWeightError();
    }
    if (isUnitTotal(total, clamped.length)) {
        return clamped;
    }
    return clamped.map(w => w / total);
}

export function cumulativeDistribution(normalized: readonly number[]): number[] {
    const cdf = new Array<number>(normalized.length);
    let running = 0;
    for (let i = 0; i < normalized.length; i++) {
        running += normalized[i];
        cdf[i] = running;
    }
    return cdf;
}

/**
 * Index of the first cumulative value at or above `u`; a value nearly equal
 * to `u` counts as a hit at its own index.
 */
export function searchCumulative(cdf: readonly number[], u: number): number {
    let minIndex = 0;
    let maxIndex = cdf.length - 1;
    while (minIndex < maxIndex) {
        const index = Math.floor((maxIndex - minIndex) / 2) + minIndex;
        const c = cdf[index];
        if (isNearlyEqual(u, c)) {
            return index;
        }
        if (u < c) {
            maxIndex = index;
        } else {
            minIndex = index + 1;
        }
    }
    return minIndex;
}

export class CategoricalDistribution {
    /**
     * Moments of the category index.
     *
     * @throws ZeroWeightError when the weights sum to (nearly) zero
     */
    static getProperties(weights?: readonly number[] | null): DistributionProperties {
        const normalized = normalizeWeights(weights);
        const cdf = cumulativeDistribution(normalized);
        const total = cdf[cdf.length - 1];

        let mean = 0;
        let maxWeight = 0;
        for (let i = 0; i < normalized.length; i++) {
            mean += normalized[i] * i;
            maxWeight = Math.max(maxWeight, normalized[i]);
        }

        let median = Number.NaN;
        let variance = 0;
        const mode: number[] = [];
        for (let i = 0; i < normalized.length; i++) {
            if (Number.isNaN(median) && cdf[i] >= total / 2) {
                median = i;
            }
            if (isNearlyEqual(normalized[i], maxWeight)) {
                mode.push(i);
            }
            variance += normalized[i] * square(i - mean);
        }

        return createProperties({
            maximum: normalized.length - 1,
            mean,
            median,
            minimum: 0,
            mode,
            variance,
        });
    }

    /**
     * Yields category indices in [0, weights.length).
     *
     * @throws ZeroWeightError immediately, before any sample is drawn
     */
    static samples(
        generator: RandomNumberGenerator,
        count: number = 1,
        options: CategoricalSampleOptions = {}
    ): SampleSequence<number> {
        const total = sampleCount(count);
        const weights = options.weights ?? (options.categories === undefined ? null : uniformWeights(options.categories));
        const cdf = cumulativeDistribution(normalizeWeights(weights));
        return drawSequence(() => searchCumulative(cdf, generator.nextDouble()), total);
    }
}
