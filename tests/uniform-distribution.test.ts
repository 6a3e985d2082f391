import {
    ContinuousUniformDistribution,
    DiscreteUniformSignedDistribution,
    DiscreteUniformUnsignedDistribution,
    INT32_MAX,
    INT32_MIN,
    RandomNumberGenerator,
    continuousUniformBounds,
} from '../src/index.js';
import { collect, mean, seeded } from './helpers/test-utils.js';

describe('ContinuousUniformDistribution', () => {
    it('defaults to [0, 1)', () => {
        const values = collect(ContinuousUniformDistribution.samples(seeded(), 5000));
        expect(values.every(v => v >= 0 && v < 1)).toBe(true);
    });

    it('draws from [minimum, maximum) with the midpoint as mean', () => {
        const values = collect(ContinuousUniformDistribution.samples(seeded(), 50_000, { minimum: 2, maximum: 4 }));
        expect(values.every(v => v >= 2 && v < 4)).toBe(true);
        expect(Math.abs(mean(values) - 3)).toBeLessThan(0.02);
    });

    it('follows the generator policy, or the per-call one, for inverted bounds', () => {
        expect(collect(ContinuousUniformDistribution.samples(seeded(), 2, { minimum: 5, maximum: 2 }))).toEqual([5, 5]);
        const values = collect(ContinuousUniformDistribution.samples(seeded(), 2, { minimum: 5, maximum: 2, invalidRange: 'nan' }));
        expect(values.every(Number.isNaN)).toBe(true);
    });

    it('keeps a unit width beside a single present bound', () => {
        const above = collect(ContinuousUniformDistribution.samples(seeded(), 2000, { minimum: 5 }));
        expect(above.every(v => v >= 5 && v < 6)).toBe(true);
        const below = collect(ContinuousUniformDistribution.samples(seeded(), 2000, { maximum: 10, minimum: null }));
        expect(below.every(v => v >= 9 && v < 10)).toBe(true);
        expect(ContinuousUniformDistribution.getProperties(5)).toMatchObject({ minimum: 5, maximum: 6, mean: 5.5 });
        expect(continuousUniformBounds(null, 10)).toEqual([9, 10]);
        expect(continuousUniformBounds(undefined, undefined)).toEqual([0, 1]);
    });

    it('returns the uniform moments with an undefined mode', () => {
        const props = ContinuousUniformDistribution.getProperties(4, 2);
        expect(props.minimum).toBe(2);
        expect(props.maximum).toBe(4);
        expect(props.mean).toBe(3);
        expect(props.median).toBe(3);
        expect(props.variance).toBe(4 / 12);
        expect(props.mode).toEqual([Number.NaN]);
        expect(ContinuousUniformDistribution.getProperties(Number.NaN, 1).mean).toBeNaN();
    });
});

describe('DiscreteUniformSignedDistribution', () => {
    it('reaches both inclusive ends', () => {
        const values = collect(DiscreteUniformSignedDistribution.samples(seeded(), 2000, { minimum: -3, maximum: 3 }));
        expect(values.every(v => Number.isInteger(v) && v >= -3 && v <= 3)).toBe(true);
        expect(new Set(values).size).toBe(7);
    });

    it('defaults to the signed 32-bit range', () => {
        const values = collect(DiscreteUniformSignedDistribution.samples(seeded(), 1000));
        expect(values.every(v => Number.isInteger(v) && v >= INT32_MIN && v <= INT32_MAX)).toBe(true);
    });

    it('clamps bounds into the signed 32-bit range', () => {
        const values = collect(DiscreteUniformSignedDistribution.samples(seeded(), 1000, { minimum: -1e12, maximum: INT32_MIN + 3 }));
        expect(values.every(v => v >= INT32_MIN && v <= INT32_MIN + 3)).toBe(true);
        expect(DiscreteUniformSignedDistribution.getProperties(-1e12, 1e12)).toMatchObject({ minimum: INT32_MIN, maximum: INT32_MAX });
    });

    it('returns (width^2 - 1) / 12 as variance', () => {
        const props = DiscreteUniformSignedDistribution.getProperties(1, 6);
        expect(props.mean).toBe(3.5);
        expect(props.variance).toBe(35 / 12);
    });
});

describe('DiscreteUniformUnsignedDistribution', () => {
    it('stays inside [minimum, maximum]', () => {
        const values = collect(DiscreteUniformUnsignedDistribution.samples(seeded(), 1000, { minimum: 10, maximum: 12 }));
        expect(values.every(v => v >= 10 && v <= 12)).toBe(true);
    });

    it('clamps a negative minimum to zero', () => {
        const values = collect(DiscreteUniformUnsignedDistribution.samples(seeded(), 1000, { minimum: -5, maximum: 3 }));
        expect(values.every(v => Number.isInteger(v) && v >= 0 && v <= 3)).toBe(true);
        expect(new Set(values).size).toBe(4);
        expect(DiscreteUniformUnsignedDistribution.getProperties(-5, 3)).toMatchObject({ minimum: 0, maximum: 3, mean: 1.5 });
    });

    it('defaults to the full unsigned range, word for word', () => {
        const rng = new RandomNumberGenerator({ seed: 5489 });
        expect(collect(DiscreteUniformUnsignedDistribution.samples(rng, 2))).toEqual([3499211612, 581869302]);
    });
});
