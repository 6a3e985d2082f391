import { ExponentialDistribution } from '../src/index.js';
import { collect, mean, seeded } from './helpers/test-utils.js';

describe('ExponentialDistribution', () => {
    it('has mean 1 / lambda', () => {
        const values = collect(ExponentialDistribution.samples(seeded(), 50_000, { lambda: 2 }));
        expect(values.every(v => v >= 0)).toBe(true);
        expect(Math.abs(mean(values) - 0.5)).toBeLessThan(0.01);
    });

    it('rejects draws above the maximum', () => {
        const values = collect(ExponentialDistribution.samples(seeded(), 2000, { lambda: 1, maximum: 1 }));
        expect(values.every(v => v >= 0 && v <= 1)).toBe(true);
    });

    it('yields 0 for a maximum of 0', () => {
        expect(collect(ExponentialDistribution.samples(seeded(), 3, { maximum: 0 }))).toEqual([0, 0, 0]);
    });

    it('resolves a negative maximum through the range policy', () => {
        expect(collect(ExponentialDistribution.samples(seeded(), 2, { maximum: -1 }))).toEqual([0, 0]);
        expect(collect(ExponentialDistribution.samples(seeded(), 2, { maximum: -1, invalidRange: 'max_bound' }))).toEqual([-1, -1]);
    });

    it('propagates a NaN rate', () => {
        expect(collect(ExponentialDistribution.samples(seeded(), 2, { lambda: Number.NaN })).every(Number.isNaN)).toBe(true);
        expect(ExponentialDistribution.getProperties(Number.NaN).variance).toBeNaN();
    });

    it('returns the closed-form moments', () => {
        expect(ExponentialDistribution.getProperties(2)).toEqual({
            maximum: Number.POSITIVE_INFINITY,
            mean: 0.5,
            median: Math.LN2 / 2,
            minimum: 0,
            mode: [0],
            variance: 0.25,
        });
    });

    it('clamps a non-positive rate to nearly zero', () => {
        expect(ExponentialDistribution.getProperties(0).mean).toBe(1 / 1e-15);
        expect(ExponentialDistribution.getProperties(-3).mean).toBe(1 / 1e-15);
    });
});
