import type { RandomNumberGenerator } from '../generators/random-number-generator.js';
import type { DistributionProperties, SampleSequence } from '../stochast-types.js';
import { PI_SQUARED, clampPositive, isNearlyZero, square } from '../stochast-utils.js';
import type { LocationScaleSampleOptions } from './normal.js';
import {
    NAN_PROPERTIES,
    constantSequence,
    createProperties,
    drawSequence,
    isOutside,
    planBounds,
    sampleCount,
} from './sequence.js';

/**
 * Inverse-CDF draw: `mu + sigma * ln(u / (1 - u))`, with `u` redrawn while
 * `u(1 - u)` is nearly zero.
 */
function drawLogistic(generator: RandomNumberGenerator, mu: number, sigma: number): number {
    let u: number;
    do {
        u = generator.nextDouble();
    } while (isNearlyZero(u * (1 - u)));
    return mu + (sigma * Math.log(u / (1 - u)));
}

export class LogisticDistribution {
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
            variance: square(sigma) * PI_SQUARED / 3,
        });
    }

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
        return drawSequence(() => {
            let v: number;
            do {
                v = drawLogistic(generator, mu, scale);
            } while (isOutside(v, minimum, maximum));
            return v;
        }, total);
    }
}
