import type { DistributionProperties, SampleSequence } from '../stochast-types.js';
import type { InvalidFloatingRangeResult, StochastLogger } from '../options.js';
import { resolveFloatingRange } from '../generators/random-number-generator.js';
import { isNearlyEqual } from '../stochast-utils.js';

export function createProperties(props: DistributionProperties): DistributionProperties {
    return Object.freeze({ ...props, mode: Object.freeze([...props.mode]) });
}

export const NAN_PROPERTIES: DistributionProperties = createProperties({
    maximum: Number.NaN,
    mean: Number.NaN,
    median: Number.NaN,
    minimum: Number.NaN,
    mode: [Number.NaN],
    variance: Number.NaN,
});

/** Number of elements a sequence yields for a caller-supplied count. */
export function sampleCount(count: number): number {
    if (!(count > 0)) return 0;
    return Number.isFinite(count) ? Math.floor(count) : Number.MAX_SAFE_INTEGER;
}

export function* constantSequence<T>(value: T, count: number): SampleSequence<T> {
    for (let c = 0; c < count; c++) {
        yield value;
    }
}

export function* drawSequence<T>(draw: () => T, count: number): SampleSequence<T> {
    for (let c = 0; c < count; c++) {
        yield draw();
    }
}

/**
 * Yields both members of each drawn pair, dropping the second member of the
 * final pair when `count` is odd.
 */
export function* pairSequence(drawPair: () => readonly [number, number], count: number): SampleSequence<number> {
    let c = 0;
    while (c < count) {
        const [z0, z1] = drawPair();
        yield z0;
        c++;
        if (c < count) {
            yield z1;
            c++;
        }
    }
}

/** Bounds a rejection sampler works against, or the constant every sample collapses to. */
export type BoundsPlan =
    | { kind: 'constant'; value: number }
    | { kind: 'bounded'; minimum: number | null; maximum: number | null };

/**
 * Applies the degenerate-bounds short circuit and the range-inversion policy
 * to optional sampler bounds. Runs before any draw, so `exception` surfaces
 * when `samples` is called.
 */
export function planBounds(
    minimum: number | null | undefined,
    maximum: number | null | undefined,
    policy: InvalidFloatingRangeResult,
    logger: StochastLogger | null
): BoundsPlan {
    const min = minimum ?? null;
    const max = maximum ?? null;
    if (min === null || max === null) {
        return { kind: 'bounded', minimum: min, maximum: max };
    }
    if (isNearlyEqual(min, max)) {
        return { kind: 'constant', value: min };
    }

    const range = resolveFloatingRange(min, max, policy, logger);
    if (range.kind === 'value') {
        return { kind: 'constant', value: range.value };
    }
    if (isNearlyEqual(range.min, range.max)) {
        return { kind: 'constant', value: range.min };
    }
    return { kind: 'bounded', minimum: range.min, maximum: range.max };
}

export function isOutside(value: number, minimum: number | null, maximum: number | null): boolean {
    return (minimum !== null && value < minimum) || (maximum !== null && value > maximum);
}
