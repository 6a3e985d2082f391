import { LogNormalDistribution } from '../src/index.js';
import { collect, mean, seeded } from './helpers/test-utils.js';

describe('LogNormalDistribution', () => {
    it('yields positive samples with mean exp(mu + sigma^2 / 2)', () => {
        const values = collect(LogNormalDistribution.samples(seeded(), 50_000, { mu: 0, sigma: 0.5 }));
        expect(values.every(v => v > 0)).toBe(true);
        expect(Math.abs(mean(values) - Math.exp(0.125))).toBeLessThan(0.02);
    });

    it('keeps samples inside positive bounds', () => {
        const values = collect(LogNormalDistribution.samples(seeded(), 2000, { minimum: 1, maximum: 2 }));
        expect(values.every(v => v >= 1 && v <= 2 + 1e-12)).toBe(true);
    });

    it('ignores a non-positive minimum', () => {
        const values = collect(LogNormalDistribution.samples(seeded(), 1000, { minimum: -5 }));
        expect(values.every(v => v > 0)).toBe(true);
    });

    it('yields 0 when the maximum leaves nothing in the support', () => {
        expect(collect(LogNormalDistribution.samples(seeded(), 3, { maximum: -1 }))).toEqual([0, 0, 0]);
    });

    it('yields exactly count samples', () => {
        expect(collect(LogNormalDistribution.samples(seeded(), 9))).toHaveLength(9);
    });

    it('returns the closed-form moments', () => {
        const props = LogNormalDistribution.getProperties(0, 1);
        expect(props.minimum).toBe(0);
        expect(props.maximum).toBe(Number.POSITIVE_INFINITY);
        expect(props.mean).toBe(Math.exp(0.5));
        expect(props.median).toBe(1);
        expect(props.mode).toEqual([Math.exp(-1)]);
        expect(props.variance).toBe(Math.expm1(1) * Math.exp(1));
    });

    it('is all NaN for a NaN mu', () => {
        expect(LogNormalDistribution.getProperties(Number.NaN, 1).mean).toBeNaN();
        expect(collect(LogNormalDistribution.samples(seeded(), 2, { mu: Number.NaN })).every(Number.isNaN)).toBe(true);
    });
});
