import { ERROR_MESSAGES, StochastError } from '../errors.js';
import type { RandomNumberGenerator } from '../generators/random-number-generator.js';
import { UINT32_MAX } from '../options.js';
import type { DistributionProperties, SampleSequence } from '../stochast-types.js';
import { clamp } from '../stochast-utils.js';
import {
    NAN_PROPERTIES,
    constantSequence,
    createProperties,
    drawSequence,
    sampleCount,
} from './sequence.js';

export interface BinomialSampleOptions {
    /** Number of trials, an integer in [0, 2^32 - 1]. Default 1 (Bernoulli). */
    n?: number;
    /** Probability of success, clamped to [0, 1]. Default 0.5. */
    p?: number;
}

export function validateTrialCount(n: number): number {
    if (!Number.isInteger(n) || n < 0 || n > UINT32_MAX) {
        throw new StochastError(`${ERROR_MESSAGES.INVALID_TRIAL_COUNT} (${n})`);
    }
    return n;
}

export class BinomialDistribution {
    static getProperties(n: number = 1, p: number = 0.5): DistributionProperties {
        validateTrialCount(n);
        if (Number.isNaN(p)) {
            return NAN_PROPERTIES;
        }
        p = clamp(p, 0, 1);
        return createProperties({
            maximum: n,
            mean: n * p,
            median: Number.NaN,
            minimum: 0,
            mode: [Math.min(n, Math.floor(p * (n + 1)))],
            variance: p * (1 - p) * n,
        });
    }

    /**
     * Each sample is the number of successes in `n` trials, a trial succeeding
     * when a uniform draw is at most `p`.
     */
    static samples(
        generator: RandomNumberGenerator,
        count: number = 1,
        options: BinomialSampleOptions = {}
    ): SampleSequence<number> {
        const total = sampleCount(count);
        const n = validateTrialCount(options.n ?? 1);
        const rawP = options.p ?? 0.5;

        if (Number.isNaN(rawP)) {
            return constantSequence(Number.NaN, total);
        }

        const p = clamp(rawP, 0, 1);
        return drawSequence(() => {
            let successes = 0;
            for (let i = 0; i < n; i++) {
                if (generator.nextDouble() <= p) {
                    successes++;
                }
            }
            return successes;
        }, total);
    }
}
