import { NormalDistribution, RangeInversionError, RandomNumberGenerator } from '../src/index.js';
import { collect, mean, seeded, variance } from './helpers/test-utils.js';

describe('NormalDistribution', () => {
    it('matches mean 5 and variance 4 over 100,000 samples', () => {
        const values = collect(NormalDistribution.samples(seeded(), 100_000, { mu: 5, sigma: 2 }));
        expect(values).toHaveLength(100_000);
        expect(Math.abs(mean(values) - 5)).toBeLessThan(0.05);
        expect(Math.abs(variance(values) - 4)).toBeLessThan(0.1);
    });

    it('yields exactly count samples, odd counts included', () => {
        const rng = seeded();
        expect(collect(NormalDistribution.samples(rng, 7))).toHaveLength(7);
        expect(collect(NormalDistribution.samples(rng, 1))).toHaveLength(1);
        expect(collect(NormalDistribution.samples(rng, 2.9))).toHaveLength(2);
        expect(collect(NormalDistribution.samples(rng, 0))).toEqual([]);
        expect(collect(NormalDistribution.samples(rng, -3))).toEqual([]);
    });

    it('returns exactly 3.5 for min == max == 3.5 without drawing', () => {
        const rng = seeded(11);
        const values = collect(NormalDistribution.samples(rng, 1000, { mu: 0, sigma: 1, minimum: 3.5, maximum: 3.5 }));
        expect(values.every(v => v === 3.5)).toBe(true);
        expect(rng.nextUIntInclusive()).toBe(seeded(11).nextUIntInclusive());
    });

    it('propagates NaN shape parameters to every sample', () => {
        const values = collect(NormalDistribution.samples(seeded(), 5, { mu: Number.NaN }));
        expect(values).toHaveLength(5);
        expect(values.every(Number.isNaN)).toBe(true);
    });

    it('keeps samples inside the bounds', () => {
        const values = collect(NormalDistribution.samples(seeded(), 5000, { mu: 5, sigma: 2, minimum: 4, maximum: 6 }));
        expect(values.every(v => v >= 4 && v <= 6)).toBe(true);
    });

    it('applies the inversion policy to the bounds', () => {
        const lenient = collect(NormalDistribution.samples(seeded(), 3, { minimum: 6, maximum: 4 }));
        expect(lenient).toEqual([6, 6, 6]);

        const swapped = collect(NormalDistribution.samples(seeded(), 100, {
            mu: 5,
            minimum: 6,
            maximum: 4,
            invalidRange: 'swap',
        }));
        expect(swapped.every(v => v >= 4 && v <= 6)).toBe(true);
    });

    it('throws on call, before iteration, under the exception policy', () => {
        const rng = new RandomNumberGenerator({ seed: 1, preset: 'strict' });
        expect(() => NormalDistribution.samples(rng, 3, { minimum: 6, maximum: 4 })).toThrow(RangeInversionError);
    });

    it('draws nothing until the sequence is read, and reads only once', () => {
        const rng = seeded(5);
        const sequence = NormalDistribution.samples(rng, 2);
        expect(rng.nextUIntInclusive()).toBe(seeded(5).nextUIntInclusive());

        expect(collect(sequence)).toHaveLength(2);
        expect(sequence.next().done).toBe(true);
    });

    it('repeats after the generator is reset', () => {
        const rng = seeded(99);
        const first = collect(NormalDistribution.samples(rng, 11, { mu: 1, sigma: 3 }));
        rng.reset();
        expect(collect(NormalDistribution.samples(rng, 11, { mu: 1, sigma: 3 }))).toEqual(first);
    });

    describe('getProperties', () => {
        it('returns the closed-form moments', () => {
            const props = NormalDistribution.getProperties(5, 2);
            expect(props).toEqual({
                maximum: Number.POSITIVE_INFINITY,
                mean: 5,
                median: 5,
                minimum: Number.NEGATIVE_INFINITY,
                mode: [5],
                variance: 4,
            });
        });

        it('clamps a non-positive sigma to nearly zero', () => {
            const props = NormalDistribution.getProperties(0, -1);
            expect(props.variance).toBeGreaterThan(0);
            expect(props.variance).toBeLessThan(1e-29);
        });

        it('is all NaN for a NaN shape parameter', () => {
            const props = NormalDistribution.getProperties(0, Number.NaN);
            expect(props.mean).toBeNaN();
            expect(props.variance).toBeNaN();
            expect(props.mode).toEqual([Number.NaN]);
        });
    });
});
