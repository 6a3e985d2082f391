import {
    BinomialDistribution,
    CategoricalDistribution,
    ContinuousUniformDistribution,
    DiscreteUniformSignedDistribution,
    DiscreteUniformUnsignedDistribution,
    ExponentialDistribution,
    LogisticDistribution,
    LogNormalDistribution,
    NormalDistribution,
    PositiveNormalDistribution,
} from '../distributions/index.js';
import type { RandomNumberGenerator } from '../generators/random-number-generator.js';
import {
    DistributionType,
    type DistributionParameters,
    type DistributionProperties,
    type SampleSequence,
} from '../stochast-types.js';
import { roundToPrecision } from '../stochast-utils.js';

function* roundedSequence(source: SampleSequence<number>, precision: number): SampleSequence<number> {
    for (const value of source) {
        yield roundToPrecision(value, precision);
    }
}

function rawSamples(generator: RandomNumberGenerator, parameters: DistributionParameters, count: number): SampleSequence<number> {
    const { minimum, maximum } = parameters;
    switch (parameters.type) {
        case DistributionType.ContinuousUniform:
            return ContinuousUniformDistribution.samples(generator, count, { minimum, maximum });
        case DistributionType.DiscreteUniformSigned:
            return DiscreteUniformSignedDistribution.samples(generator, count, { minimum, maximum });
        case DistributionType.DiscreteUniformUnsigned:
            return DiscreteUniformUnsignedDistribution.samples(generator, count, { minimum, maximum });
        // Bounds are carried but not enforced for the two counting kinds.
        case DistributionType.Binomial:
            return BinomialDistribution.samples(generator, count, { n: parameters.n, p: parameters.p });
        case DistributionType.Categorical:
            return CategoricalDistribution.samples(generator, count, { weights: parameters.weights });
        case DistributionType.Exponential:
            return ExponentialDistribution.samples(generator, count, { lambda: parameters.lambda, maximum });
        case DistributionType.PositiveNormal:
            return PositiveNormalDistribution.samples(generator, count, {
                mu: parameters.mu,
                sigma: parameters.sigma,
                maximum,
            });
        case DistributionType.LogNormal:
            return LogNormalDistribution.samples(generator, count, {
                mu: parameters.mu,
                sigma: parameters.sigma,
                minimum,
                maximum,
            });
        case DistributionType.Logistic:
            return LogisticDistribution.samples(generator, count, {
                mu: parameters.mu,
                sigma: parameters.sigma,
                minimum,
                maximum,
            });
        case DistributionType.Normal:
            return NormalDistribution.samples(generator, count, {
                mu: parameters.mu,
                sigma: parameters.sigma,
                minimum,
                maximum,
            });
    }
}

/**
 * Draws `count` samples of the distribution `parameters` describes, rounded
 * to `parameters.precision` decimal places when one is set.
 *
 * Validation happens on the call; sampling happens as the sequence is read.
 */
export function sampleParameters(
    generator: RandomNumberGenerator,
    parameters: DistributionParameters,
    count: number = 1
): SampleSequence<number> {
    const source = rawSamples(generator, parameters, count);
    return parameters.precision === null ? source : roundedSequence(source, parameters.precision);
}

export function getParameterProperties(parameters: DistributionParameters): DistributionProperties {
    const { minimum, maximum } = parameters;
    switch (parameters.type) {
        case DistributionType.ContinuousUniform:
            return ContinuousUniformDistribution.getProperties(minimum, maximum);
        case DistributionType.DiscreteUniformSigned:
            return DiscreteUniformSignedDistribution.getProperties(minimum, maximum);
        case DistributionType.DiscreteUniformUnsigned:
            return DiscreteUniformUnsignedDistribution.getProperties(minimum, maximum);
        case DistributionType.Binomial:
            return BinomialDistribution.getProperties(parameters.n, parameters.p);
        case DistributionType.Categorical:
            return CategoricalDistribution.getProperties(parameters.weights);
        case DistributionType.Exponential:
            return ExponentialDistribution.getProperties(parameters.lambda);
        case DistributionType.PositiveNormal:
            return PositiveNormalDistribution.getProperties(parameters.mu, parameters.sigma);
        case DistributionType.LogNormal:
            return LogNormalDistribution.getProperties(parameters.mu, parameters.sigma);
        case DistributionType.Logistic:
            return LogisticDistribution.getProperties(parameters.mu, parameters.sigma);
        case DistributionType.Normal:
            return NormalDistribution.getProperties(parameters.mu, parameters.sigma);
    }
}
