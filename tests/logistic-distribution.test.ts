import { LogisticDistribution, RandomNumberGenerator, RangeInversionError } from '../src/index.js';
import { collect, mean, seeded, variance } from './helpers/test-utils.js';

describe('LogisticDistribution', () => {
    it('matches the mean and variance over 50,000 samples', () => {
        const values = collect(LogisticDistribution.samples(seeded(), 50_000, { mu: 1, sigma: 0.5 }));
        expect(Math.abs(mean(values) - 1)).toBeLessThan(0.03);
        expect(Math.abs(variance(values) - (0.25 * Math.PI * Math.PI / 3))).toBeLessThan(0.05);
    });

    it('keeps samples inside the bounds', () => {
        const values = collect(LogisticDistribution.samples(seeded(), 2000, { minimum: -0.5, maximum: 0.25 }));
        expect(values.every(v => v >= -0.5 && v <= 0.25)).toBe(true);
    });

    it('short-circuits nearly equal bounds', () => {
        expect(collect(LogisticDistribution.samples(seeded(), 4, { minimum: 2, maximum: 2 }))).toEqual([2, 2, 2, 2]);
    });

    it('applies the generator policy to inverted bounds', () => {
        const zero = new RandomNumberGenerator({ seed: 1, invalidFloatingRange: 'zero' });
        expect(collect(LogisticDistribution.samples(zero, 2, { minimum: 3, maximum: 1 }))).toEqual([0, 0]);

        const nan = new RandomNumberGenerator({ seed: 1, invalidFloatingRange: 'nan' });
        expect(collect(LogisticDistribution.samples(nan, 2, { minimum: 3, maximum: 1 })).every(Number.isNaN)).toBe(true);

        const strict = new RandomNumberGenerator({ seed: 1, preset: 'strict' });
        expect(() => LogisticDistribution.samples(strict, 2, { minimum: 3, maximum: 1 })).toThrow(RangeInversionError);
    });

    it('yields exactly count samples', () => {
        expect(collect(LogisticDistribution.samples(seeded(), 3))).toHaveLength(3);
    });

    it('returns variance sigma^2 * pi^2 / 3', () => {
        const props = LogisticDistribution.getProperties(2, 3);
        expect(props.mean).toBe(2);
        expect(props.median).toBe(2);
        expect(props.mode).toEqual([2]);
        expect(props.variance).toBe(9 * (Math.PI * Math.PI) / 3);
    });
});
