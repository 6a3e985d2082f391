/**
 * Construction, equality and combination of {@link DistributionParameters}.
 *
 * Every value leaving this module is normalized and frozen:
 * - sigma / lambda at or below zero become NEARLY_ZERO (NaN is kept)
 * - categorical weights are clamped and normalized, defaulting to three equal weights
 * - a minimum of -Infinity or a maximum of +Infinity is stored as `null`
 */

import { ERROR_MESSAGES, StochastError } from '../errors.js';
import { normalizeWeights, validateTrialCount } from '../distributions/index.js';
import { INT32_MAX, INT32_MIN, UINT32_MAX } from '../options.js';
import {
    DistributionType,
    type BinomialParameters,
    type CategoricalParameters,
    type ContinuousUniformParameters,
    type DiscreteUniformSignedParameters,
    type DiscreteUniformUnsignedParameters,
    type DistributionParameters,
    type ExponentialParameters,
    type LocationScaleParameters,
    type LocationScaleType,
    type ParameterBounds,
} from '../stochast-types.js';
import { clampPositive } from '../stochast-utils.js';

export interface BoundsInit {
    minimum?: number | null;
    maximum?: number | null;
    precision?: number | null;
}

/** Loose description of a parameter set; missing shape fields take the kind's defaults. */
export type ParametersInit = BoundsInit & (
    | { type: DistributionType.ContinuousUniform | DistributionType.DiscreteUniformSigned | DistributionType.DiscreteUniformUnsigned }
    | { type: DistributionType.Exponential; lambda?: number }
    | { type: DistributionType.Binomial; n?: number; p?: number }
    | { type: DistributionType.Categorical; weights?: readonly number[] | null }
    | { type: LocationScaleType; mu?: number; sigma?: number }
);

export function isDistributionType(value: number): value is DistributionType {
    return Number.isInteger(value) && value >= DistributionType.ContinuousUniform && value <= DistributionType.Normal;
}

function validatePrecision(precision: number | null | undefined): number | null {
    if (precision === null || precision === undefined) return null;
    if (!Number.isInteger(precision) || precision < 0 || precision > 255) {
        throw new StochastError(`${ERROR_MESSAGES.INVALID_PRECISION} (${precision})`);
    }
    return precision;
}

function normalizeBounds(init: BoundsInit): ParameterBounds {
    const minimum = init.minimum ?? null;
    const maximum = init.maximum ?? null;
    return {
        minimum: minimum === Number.NEGATIVE_INFINITY ? null : minimum,
        maximum: maximum === Number.POSITIVE_INFINITY ? null : maximum,
        precision: validatePrecision(init.precision),
    };
}

function freeze<T extends ParameterBounds>(value: T): T {
    Object.freeze(value);
    return value;
}

function locationScale<T extends LocationScaleType>(type: T, bounds: ParameterBounds, mu: number, sigma: number): LocationScaleParameters<T> {
    return freeze<LocationScaleParameters<T>>({ type, ...bounds, mu, sigma: clampPositive(sigma) });
}

/**
 * Builds a normalized, frozen parameter value.
 *
 * @throws ZeroWeightError for categorical weights summing to (nearly) zero
 * @throws StochastError for a precision outside [0, 255] or an invalid trial count
 */
export function createParameters(init: ParametersInit): DistributionParameters {
    const bounds = normalizeBounds(init);
    switch (init.type) {
        case DistributionType.ContinuousUniform:
            return freeze<ContinuousUniformParameters>({ type: DistributionType.ContinuousUniform, ...bounds });
        case DistributionType.DiscreteUniformSigned:
            return freeze<DiscreteUniformSignedParameters>({ type: DistributionType.DiscreteUniformSigned, ...bounds });
        case DistributionType.DiscreteUniformUnsigned:
            return freeze<DiscreteUniformUnsignedParameters>({ type: DistributionType.DiscreteUniformUnsigned, ...bounds });
        case DistributionType.Exponential:
            return freeze<ExponentialParameters>({
                type: DistributionType.Exponential,
                ...bounds,
                lambda: clampPositive(init.lambda ?? 1),
            });
        case DistributionType.Binomial:
            return freeze<BinomialParameters>({
                type: DistributionType.Binomial,
                ...bounds,
                n: validateTrialCount(init.n ?? 1),
                p: init.p ?? 0.5,
            });
        case DistributionType.Categorical:
            return freeze<CategoricalParameters>({
                type: DistributionType.Categorical,
                ...bounds,
                weights: Object.freeze(normalizeWeights(init.weights)),
            });
        case DistributionType.Logistic:
            return locationScale(DistributionType.Logistic, bounds, init.mu ?? 0, init.sigma ?? 1);
        case DistributionType.LogNormal:
            return locationScale(DistributionType.LogNormal, bounds, init.mu ?? 0, init.sigma ?? 1);
        case DistributionType.Normal:
            return locationScale(DistributionType.Normal, bounds, init.mu ?? 0, init.sigma ?? 1);
        case DistributionType.PositiveNormal:
            return locationScale(DistributionType.PositiveNormal, bounds, init.mu ?? 0, init.sigma ?? 1);
    }
}

export function newContinuousUniform(minimum: number = 0, maximum: number = 1, precision: number | null = null): DistributionParameters {
    return createParameters({ type: DistributionType.ContinuousUniform, minimum, maximum, precision });
}

export function newDiscreteUniformSigned(minimum: number | null = null, maximum: number | null = null): DistributionParameters {
    return createParameters({ type: DistributionType.DiscreteUniformSigned, minimum, maximum });
}

export function newDiscreteUniformUnsigned(minimum: number | null = null, maximum: number | null = null): DistributionParameters {
    return createParameters({ type: DistributionType.DiscreteUniformUnsigned, minimum, maximum });
}

export function newBinomial(n: number = 1, p: number = 0.5): DistributionParameters {
    return createParameters({ type: DistributionType.Binomial, n, p });
}

export function newCategorical(weights?: readonly number[] | null): DistributionParameters {
    return createParameters({ type: DistributionType.Categorical, weights });
}

export function newExponential(lambda: number = 1, maximum: number | null = null, precision: number | null = null): DistributionParameters {
    return createParameters({ type: DistributionType.Exponential, lambda, maximum, precision });
}

export function newLocationScale(
    type: LocationScaleType,
    mu: number = 0,
    sigma: number = 1,
    bounds: BoundsInit = {}
): DistributionParameters {
    return createParameters({ type, mu, sigma, ...bounds });
}

export function newFixedInt32(value: number): DistributionParameters {
    const v = Math.trunc(Math.min(INT32_MAX, Math.max(INT32_MIN, value)));
    return createParameters({ type: DistributionType.DiscreteUniformSigned, minimum: v, maximum: v });
}

export function newFixedUInt32(value: number): DistributionParameters {
    const v = Math.trunc(Math.min(UINT32_MAX, Math.max(0, value)));
    return createParameters({ type: DistributionType.DiscreteUniformUnsigned, minimum: v, maximum: v });
}

export function newFixedReal(value: number, precision: number | null = null): DistributionParameters {
    return createParameters({ type: DistributionType.ContinuousUniform, minimum: value, maximum: value, precision });
}

export const DEFAULT_PARAMETERS = newContinuousUniform();
export const DEFAULT_BINOMIAL = newBinomial();
export const DEFAULT_CATEGORICAL = newCategorical();
export const DEFAULT_DISCRETE_UNIFORM_SIGNED = newDiscreteUniformSigned();
export const DEFAULT_DISCRETE_UNIFORM_UNSIGNED = newDiscreteUniformUnsigned();
export const DEFAULT_EXPONENTIAL = newExponential();
export const DEFAULT_LOGISTIC = newLocationScale(DistributionType.Logistic);
export const DEFAULT_LOG_NORMAL = newLocationScale(DistributionType.LogNormal);
export const DEFAULT_NORMAL = newLocationScale(DistributionType.Normal);
export const DEFAULT_POSITIVE_NORMAL = newLocationScale(DistributionType.PositiveNormal);
export const ZERO_PARAMETERS = newFixedInt32(0);

/**
 * Shape fields in wire order: [lambda], [n, p], the weights, [mu, sigma], or none.
 */
export function shapeValues(parameters: DistributionParameters): number[] {
    switch (parameters.type) {
        case DistributionType.ContinuousUniform:
        case DistributionType.DiscreteUniformSigned:
        case DistributionType.DiscreteUniformUnsigned:
            return [];
        case DistributionType.Exponential:
            return [parameters.lambda];
        case DistributionType.Binomial:
            return [parameters.n, parameters.p];
        case DistributionType.Categorical:
            return [...parameters.weights];
        case DistributionType.Logistic:
        case DistributionType.LogNormal:
        case DistributionType.Normal:
        case DistributionType.PositiveNormal:
            return [parameters.mu, parameters.sigma];
    }
}

/**
 * Inverse of {@link shapeValues}: rebuilds a parameter value from wire-order
 * shape fields, or from the kind's defaults when `values` is `null`. Returns
 * `null` when the count does not fit the kind.
 */
export function fromShapeValues(type: DistributionType, values: readonly number[] | null, bounds: BoundsInit): DistributionParameters | null {
    switch (type) {
        case DistributionType.ContinuousUniform:
        case DistributionType.DiscreteUniformSigned:
        case DistributionType.DiscreteUniformUnsigned:
            return values === null || values.length === 0 ? createParameters({ type, ...bounds }) : null;
        case DistributionType.Exponential:
            if (values === null) return createParameters({ type, ...bounds });
            return values.length === 1 ? createParameters({ type, ...bounds, lambda: values[0] }) : null;
        case DistributionType.Binomial:
            if (values === null) return createParameters({ type, ...bounds });
            return values.length === 2 ? createParameters({ type, ...bounds, n: values[0], p: values[1] }) : null;
        case DistributionType.Categorical:
            if (values === null) return createParameters({ type, ...bounds });
            return values.length >= 1 ? createParameters({ type, ...bounds, weights: values }) : null;
        case DistributionType.Logistic:
        case DistributionType.LogNormal:
        case DistributionType.Normal:
        case DistributionType.PositiveNormal:
            if (values === null) return createParameters({ type, ...bounds });
            return values.length === 2 ? createParameters({ type, ...bounds, mu: values[0], sigma: values[1] }) : null;
    }
}

function sameNumber(a: number | null, b: number | null): boolean {
    if (a === null || b === null) return a === b;
    return Object.is(a, b);
}

/**
 * Structural equality with bit-identical numbers: NaN equals NaN, -0 differs from 0.
 */
export function parametersEqual(a: DistributionParameters, b: DistributionParameters): boolean {
    if (a.type !== b.type
        || !sameNumber(a.minimum, b.minimum)
        || !sameNumber(a.maximum, b.maximum)
        || a.precision !== b.precision) {
        return false;
    }
    const av = shapeValues(a);
    const bv = shapeValues(b);
    return av.length === bv.length && av.every((v, i) => Object.is(v, bv[i]));
}

function combineOptional(a: number | null, b: number | null, pick: (x: number, y: number) => number): number | null {
    if (a === null) return b;
    if (b === null) return a;
    return pick(a, b);
}

/**
 * Merges two parameter sets: the higher kind index wins, bounds widen,
 * precision takes the larger value. Shape fields are averaged when both
 * sides are of the winning kind, otherwise taken from the side that is.
 */
export function combineParameters(a: DistributionParameters, b: DistributionParameters): DistributionParameters {
    const type = Math.max(a.type, b.type);
    const bounds: BoundsInit = {
        minimum: combineOptional(a.minimum, b.minimum, Math.min),
        maximum: combineOptional(a.maximum, b.maximum, Math.max),
        precision: combineOptional(a.precision, b.precision, Math.max),
    };

    let values: number[];
    if (a.type === b.type) {
        const av = shapeValues(a);
        const bv = shapeValues(b);
        const length = Math.max(av.length, bv.length);
        values = [];
        for (let i = 0; i < length; i++) {
            if (i >= av.length) values.push(bv[i]);
            else if (i >= bv.length) values.push(av[i]);
            else values.push((av[i] + bv[i]) / 2);
        }
        if (a.type === DistributionType.Binomial) {
            values[0] = Math.round(values[0]);
        }
    } else {
        values = shapeValues(a.type === type ? a : b);
    }

    const combined = isDistributionType(type) ? fromShapeValues(type, values, bounds) : null;
    if (!combined) {
        throw new StochastError(`Cannot combine parameters of kinds ${a.type} and ${b.type}`);
    }
    return combined;
}
