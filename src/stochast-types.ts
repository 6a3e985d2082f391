/**
 * Core value types shared by the samplers and the parameter codec.
 */

/**
 * Distribution kinds. The numeric value is the kind index of the round-trip
 * format and must never be renumbered.
 */
export enum DistributionType {
    /** Real numbers, uniformly distributed. */
    ContinuousUniform = 0,
    /** Signed 32-bit integers, uniformly distributed. */
    DiscreteUniformSigned = 1,
    /** Unsigned 32-bit integers, uniformly distributed. */
    DiscreteUniformUnsigned = 2,
    /** Binomial; a single trial gives the Bernoulli distribution. */
    Binomial = 3,
    /** Categorical (discrete), possibly weighted. */
    Categorical = 4,
    /** The upper half of a normal distribution. */
    PositiveNormal = 5,
    Exponential = 6,
    LogNormal = 7,
    Logistic = 8,
    Normal = 9,
}

export interface DistributionProperties {
    /** Exclusive maximum bound of possible values. */
    readonly maximum: number;
    /** NaN when undefined. */
    readonly mean: number;
    /** NaN when undefined. */
    readonly median: number;
    /** Inclusive minimum bound of possible values. */
    readonly minimum: number;
    /** All modes; `[NaN]` when the mode is undefined. */
    readonly mode: readonly number[];
    /** NaN when undefined. */
    readonly variance: number;
}

/**
 * A lazy, forward-only sequence of samples. Each value is drawn when the
 * consumer asks for it; once consumed the sequence cannot be replayed.
 * Enumerating the same source again requires a fresh `samples` call, and
 * yields the same values only if the generator was reset in between.
 */
export type SampleSequence<T = number> = IterableIterator<T>;

/** Fields every parameter variant carries. `null` means unbounded / unrounded. */
export interface ParameterBounds {
    readonly minimum: number | null;
    readonly maximum: number | null;
    /** Decimal places sampled values are rounded to. */
    readonly precision: number | null;
}

export interface ContinuousUniformParameters extends ParameterBounds {
    readonly type: DistributionType.ContinuousUniform;
}

export interface DiscreteUniformSignedParameters extends ParameterBounds {
    readonly type: DistributionType.DiscreteUniformSigned;
}

export interface DiscreteUniformUnsignedParameters extends ParameterBounds {
    readonly type: DistributionType.DiscreteUniformUnsigned;
}

export interface BinomialParameters extends ParameterBounds {
    readonly type: DistributionType.Binomial;
    /** Number of trials. */
    readonly n: number;
    /** Probability of success of one trial. */
    readonly p: number;
}

export interface CategoricalParameters extends ParameterBounds {
    readonly type: DistributionType.Categorical;
    /** Normalized probability vector. */
    readonly weights: readonly number[];
}

export interface ExponentialParameters extends ParameterBounds {
    readonly type: DistributionType.Exponential;
    /** Rate. */
    readonly lambda: number;
}

export type LocationScaleType =
    | DistributionType.Logistic
    | DistributionType.LogNormal
    | DistributionType.Normal
    | DistributionType.PositiveNormal;

export interface LocationScaleParameters<T extends LocationScaleType = LocationScaleType> extends ParameterBounds {
    readonly type: T;
    /** Location. */
    readonly mu: number;
    /** Scale. */
    readonly sigma: number;
}

export type DistributionParameters =
    | ContinuousUniformParameters
    | DiscreteUniformSignedParameters
    | DiscreteUniformUnsignedParameters
    | BinomialParameters
    | CategoricalParameters
    | ExponentialParameters
    | LocationScaleParameters<DistributionType.Logistic>
    | LocationScaleParameters<DistributionType.LogNormal>
    | LocationScaleParameters<DistributionType.Normal>
    | LocationScaleParameters<DistributionType.PositiveNormal>;
