import type { RandomNumberGenerator } from '../generators/random-number-generator.js';
import type { DistributionProperties, SampleSequence } from '../stochast-types.js';
import { clampPositive, isNearlyEqual, square } from '../stochast-utils.js';
import { drawNormalPair, type LocationScaleSampleOptions } from './normal.js';
import {
    NAN_PROPERTIES,
    constantSequence,
    createProperties,
    pairSequence,
    planBounds,
    sampleCount,
} from './sequence.js';

export type PositiveNormalSampleOptions = Omit<LocationScaleSampleOptions, 'minimum'>;

/**
 * The half of a normal distribution at or above `mu`: each deviate is folded
 * onto `mu + |deviate - mu|`.
 */
export class PositiveNormalDistribution {
    static getProperties(mu: number = 0, sigma: number = 1): DistributionProperties {
        if (Number.isNaN(mu) || Number.isNaN(sigma)) {
            return NAN_PROPERTIES;
        }
        sigma = clampPositive(sigma);
        return createProperties({
            maximum: Number.POSITIVE_INFINITY,
            mean: Number.NaN,
            median: Number.NaN,
            minimum: mu,
            mode: [mu],
            variance: square(sigma),
        });
    }

    static samples(
        generator: RandomNumberGenerator,
        count: number = 1,
        options: PositiveNormalSampleOptions = {}
    ): SampleSequence<number> {
        const total = sampleCount(count);
        const mu = options.mu ?? 0;
        const sigma = options.sigma ?? 1;

        if (Number.isNaN(mu) || Number.isNaN(sigma)) {
            return constantSequence(Number.NaN, total);
        }

        // The support starts at mu, so a maximum below it is an inverted range.
        const plan = planBounds(
            options.maximum === undefined || options.maximum === null ? null : mu,
            options.maximum,
            options.invalidRange ?? generator.invalidFloatingRange,
            generator.logger
        );
        if (plan.kind === 'constant') {
            return constantSequence(plan.value, total);
        }
        const maximum = plan.maximum;
        if (maximum !== null && (maximum < mu || isNearlyEqual(maximum, mu))) {
            return constantSequence(mu, total);
        }

        const scale = clampPositive(sigma);
        return pairSequence(() => {
            let z0: number;
            let z1: number;
            do {
                [z0, z1] = drawNormalPair(generator, 0, scale);
                z0 = mu + Math.abs(z0);
                z1 = mu + Math.abs(z1);
            } while (maximum !== null && (z0 > maximum || z1 > maximum));
            return [z0, z1] as const;
        }, total);
    }
}
