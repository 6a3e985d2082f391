import { RandomNumberGenerator, type SampleSequence } from '../../src/index.js';

export function seeded(seed: number = 20240601): RandomNumberGenerator {
    return new RandomNumberGenerator({ seed });
}

export function collect(sequence: SampleSequence<number>): number[] {
    return Array.from(sequence);
}

export function mean(values: readonly number[]): number {
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Population variance. */
export function variance(values: readonly number[]): number {
    const m = mean(values);
    return values.reduce((sum, v) => sum + ((v - m) * (v - m)), 0) / values.length;
}

export function frequency(values: readonly number[], target: number): number {
    return values.filter(v => v === target).length / values.length;
}

export function expectSameNumber(actual: number | null, expected: number | null): void {
    if (actual === null || expected === null) {
        expect(actual).toBe(expected);
        return;
    }
    expect(Object.is(actual, expected)).toBe(true);
}
