import type { RandomNumberGenerator } from '../generators/random-number-generator.js';
import type { DistributionProperties, SampleSequence } from '../stochast-types.js';
import { clampPositive, square } from '../stochast-utils.js';
import { drawBoundedPair, type LocationScaleSampleOptions } from './normal.js';
import {
    NAN_PROPERTIES,
    constantSequence,
    createProperties,
    pairSequence,
    planBounds,
    sampleCount,
} from './sequence.js';

/**
 * `exp(X)` for `X ~ Normal(mu, sigma)`. Samples reuse the normal sampler with
 * the bounds moved into log space; moments are the closed forms.
 */
export class LogNormalDistribution {
    static getProperties(mu: number = 0, sigma: number = 1): DistributionProperties {
        if (Number.isNaN(mu) || Number.isNaN(sigma)) {
            return NAN_PROPERTIES;
        }
        const variance = square(clampPositive(sigma));
        return createProperties({
            maximum: Number.POSITIVE_INFINITY,
            mean: Math.exp(mu + (variance / 2)),
            median: Math.exp(mu),
            minimum: 0,
            mode: [Math.exp(mu - variance)],
            variance: Math.expm1(variance) * Math.exp((2 * mu) + variance),
        });
    }

    /**
     * A non-positive minimum is no constraint; a non-positive maximum leaves
     * nothing in the support, so every sample is 0.
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
        if (plan.maximum !== null && plan.maximum <= 0) {
            return constantSequence(0, total);
        }

        const logMin = plan.minimum !== null && plan.minimum > 0 ? Math.log(plan.minimum) : null;
        const logMax = plan.maximum !== null ? Math.log(plan.maximum) : null;
        const scale = clampPositive(sigma);
        return pairSequence(() => {
            const [z0, z1] = drawBoundedPair(generator, mu, scale, logMin, logMax);
            return [Math.exp(z0), Math.exp(z1)] as const;
        }, total);
    }
}
