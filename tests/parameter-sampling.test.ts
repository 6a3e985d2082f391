import {
    DEFAULT_NORMAL,
    DEFAULT_PARAMETERS,
    DistributionType,
    NormalDistribution,
    createParameters,
    getParameterProperties,
    newBinomial,
    newCategorical,
    newContinuousUniform,
    newDiscreteUniformUnsigned,
    newExponential,
    newFixedInt32,
    newFixedReal,
    newLocationScale,
    sampleParameters,
} from '../src/index.js';
import { collect, seeded } from './helpers/test-utils.js';

describe('sampleParameters', () => {
    it('dispatches to the sampler of the kind with the same draws', () => {
        const viaParameters = collect(sampleParameters(seeded(3), newLocationScale(DistributionType.Normal, 1, 2), 25));
        const direct = collect(NormalDistribution.samples(seeded(3), 25, { mu: 1, sigma: 2 }));
        expect(viaParameters).toEqual(direct);
    });

    it('honors the degenerate bounds short circuit', () => {
        const value = newLocationScale(DistributionType.Normal, 0, 1, { minimum: 3.5, maximum: 3.5 });
        expect(collect(sampleParameters(seeded(), value, 4))).toEqual([3.5, 3.5, 3.5, 3.5]);
    });

    it('rounds to the requested precision', () => {
        const values = collect(sampleParameters(seeded(), newContinuousUniform(0, 10, 1), 500));
        expect(values.every(v => v >= 0 && v <= 10 && Number(v.toFixed(1)) === v)).toBe(true);

        const integers = collect(sampleParameters(seeded(), newLocationScale(DistributionType.Normal, 0, 5, { precision: 0 }), 500));
        expect(integers.every(Number.isInteger)).toBe(true);
    });

    it('leaves non-finite samples alone when rounding', () => {
        const value = newLocationScale(DistributionType.Normal, Number.NaN, 1, { precision: 2 });
        expect(collect(sampleParameters(seeded(), value, 2)).every(Number.isNaN)).toBe(true);
    });

    it('covers the counting and fixed kinds', () => {
        expect(collect(sampleParameters(seeded(), newBinomial(4, 1), 3))).toEqual([4, 4, 4]);
        expect(collect(sampleParameters(seeded(), newCategorical([0, 1]), 3))).toEqual([1, 1, 1]);
        expect(collect(sampleParameters(seeded(), newFixedInt32(7), 3))).toEqual([7, 7, 7]);
        expect(collect(sampleParameters(seeded(), newFixedReal(1.25), 2))).toEqual([1.25, 1.25]);
    });

    it('samples a continuous uniform with one bound over a unit width', () => {
        const value = createParameters({ type: DistributionType.ContinuousUniform, minimum: 5 });
        const values = collect(sampleParameters(seeded(1), value, 500));
        expect(values.every(v => v >= 5 && v < 6)).toBe(true);
        expect(getParameterProperties(value)).toMatchObject({ minimum: 5, maximum: 6 });
    });

    it('keeps unsigned samples non-negative', () => {
        const values = collect(sampleParameters(seeded(), newDiscreteUniformUnsigned(-5, 3), 200));
        expect(values.every(v => v >= 0 && v <= 3)).toBe(true);
    });

    it('enforces the exponential maximum', () => {
        const values = collect(sampleParameters(seeded(), newExponential(1, 0.5), 500));
        expect(values.every(v => v >= 0 && v <= 0.5)).toBe(true);
    });

    it('enforces only the maximum for positive normal', () => {
        const value = createParameters({ type: DistributionType.PositiveNormal, mu: 1, sigma: 1, minimum: 100, maximum: 2 });
        const values = collect(sampleParameters(seeded(), value, 200));
        expect(values.every(v => v >= 1 && v <= 2)).toBe(true);
    });
});

describe('getParameterProperties', () => {
    it('dispatches to the kind, filling open uniform bounds with defaults', () => {
        expect(getParameterProperties(DEFAULT_NORMAL)).toEqual(NormalDistribution.getProperties(0, 1));
        expect(getParameterProperties(DEFAULT_PARAMETERS).mean).toBe(0.5);
        expect(getParameterProperties(createParameters({ type: DistributionType.ContinuousUniform })).maximum).toBe(1);
        expect(getParameterProperties(newCategorical([1, 1, 2])).mode).toEqual([2]);
        expect(getParameterProperties(newExponential(4)).mean).toBe(0.25);
    });
});
