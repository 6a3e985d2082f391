import type { RandomNumberGenerator } from '../generators/random-number-generator.js';
import type { InvalidFloatingRangeResult } from '../options.js';
import type { DistributionProperties, SampleSequence } from '../stochast-types.js';
import { LN2, clampPositive, isNearlyEqual, isNearlyZero } from '../stochast-utils.js';
import {
    NAN_PROPERTIES,
    constantSequence,
    createProperties,
    drawSequence,
    planBounds,
    sampleCount,
} from './sequence.js';

export interface ExponentialSampleOptions {
    /** Rate. Default 1; values at or below zero are clamped to nearly zero. */
    lambda?: number;
    /** Inclusive upper bound, enforced by rejection. */
    maximum?: number | null;
    /** Applies when `maximum` is negative, i.e. below the support. */
    invalidRange?: InvalidFloatingRangeResult;
}

function drawExponential(generator: RandomNumberGenerator, lambda: number): number {
    let u: number;
    do {
        u = generator.nextDouble();
    } while (isNearlyZero(u));
    return -Math.log(u) / lambda;
}

export class ExponentialDistribution {
    static getProperties(lambda: number = 1): DistributionProperties {
        if (Number.isNaN(lambda)) {
            return NAN_PROPERTIES;
        }
        lambda = clampPositive(lambda);
        return createProperties({
            maximum: Number.POSITIVE_INFINITY,
            mean: 1 / lambda,
            median: LN2 / lambda,
            minimum: 0,
            mode: [0],
            variance: Math.pow(lambda, -2),
        });
    }

    static samples(
        generator: RandomNumberGenerator,
        count: number = 1,
        options: ExponentialSampleOptions = {}
    ): SampleSequence<number> {
        const total = sampleCount(count);
        const lambda = options.lambda ?? 1;

        if (Number.isNaN(lambda)) {
            return constantSequence(Number.NaN, total);
        }

        const plan = planBounds(
            options.maximum === undefined || options.maximum === null ? null : 0,
            options.maximum,
            options.invalidRange ?? generator.invalidFloatingRange,
            generator.logger
        );
        if (plan.kind === 'constant') {
            return constantSequence(plan.value, total);
        }
        const maximum = plan.maximum;
        if (maximum !== null && isNearlyEqual(maximum, 0)) {
            return constantSequence(0, total);
        }

        const rate = clampPositive(lambda);
        return drawSequence(() => {
            let v: number;
            do {
                v = drawExponential(generator, rate);
            } while (maximum !== null && v > maximum);
            return v;
        }, total);
    }
}
