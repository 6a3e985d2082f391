import { DistributionType, Stochast, newCategorical, newLocationScale, parametersEqual } from '../src/index.js';

describe('Stochast namespace', () => {
    it('creates seeded generators', () => {
        const rng = Stochast.createGenerator({ seed: 5489 });
        expect(rng.nextUIntInclusive()).toBe(3499211612);
    });

    it('samples with a given or the shared generator', () => {
        const value = newLocationScale(DistributionType.Normal, 5, 2);
        const a = Array.from(Stochast.sample(value, 6, Stochast.createGenerator({ seed: 1 })));
        const b = Array.from(Stochast.sample(value, 6, Stochast.createGenerator({ seed: 1 })));
        expect(a).toEqual(b);
        expect(Array.from(Stochast.sample(value, 5))).toHaveLength(5);
    });

    it('reports properties', () => {
        expect(Stochast.properties(newCategorical([1, 1, 2])).mode).toEqual([2]);
    });

    it('formats and parses', () => {
        const value = newLocationScale(DistributionType.Logistic, -1, 0.5, { maximum: 4, precision: 2 });
        const text = Stochast.format(value, 'r');
        expect(text).toBe('8:-Infinity;4:-1;0.5:2');
        expect(parametersEqual(Stochast.parse(text), value)).toBe(true);
        expect(Stochast.format(value, 'g', { locale: 'en-US' })).toBe('Logistic distribution (-∞;4.00) [-1.00;0.50] r:2');
    });
});
