/**
 * Uniform derivation layer over a {@link BitGenerator}.
 *
 * Every bounded operation consults this instance's range-inversion policies
 * (see {@link RandomizeOptions}); nothing here reads process-wide state.
 */

import { RangeInversionError, NullBufferError } from '../errors.js';
import {
    resolveRandomizeOptions,
    validateSeed,
    INT32_MAX,
    INT32_MIN,
    UINT32_MAX,
    type InvalidFloatingRangeResult,
    type InvalidIntegralRangeResult,
    type RandomizeOptions,
    type ResolvedRandomizeOptions,
    type StochastLogger,
} from '../options.js';
import { MersenneTwister, type BitGenerator } from './mersenne-twister.js';

/** Outcome of applying a range policy: either a final value or a (possibly swapped) range to draw from. */
export type RangeResolution =
    | { kind: 'value'; value: number }
    | { kind: 'range'; min: number; max: number };

/**
 * Resolves `min > max` under a floating policy. Ranges already in order come back untouched.
 */
export function resolveFloatingRange(
    min: number,
    max: number,
    policy: InvalidFloatingRangeResult,
    logger: StochastLogger | null = null
): RangeResolution {
    if (!(min > max)) return { kind: 'range', min, max };

    if (policy === 'exception') {
        logger?.error?.(`[RNG] inverted floating range (${min} > ${max}) rejected by policy 'exception'`);
        throw new RangeInversionError(min, max);
    }
    logger?.warn?.(`[RNG] inverted floating range (${min} > ${max}) resolved by policy '${policy}'`);
    switch (policy) {
        case 'min_bound':
            return { kind: 'value', value: min };
        case 'zero':
            return { kind: 'value', value: 0 };
        case 'max_bound':
            return { kind: 'value', value: max };
        case 'swap':
            return { kind: 'range', min: max, max: min };
        case 'nan':
            return { kind: 'value', value: Number.NaN };
    }
}

/**
 * Integral counterpart of {@link resolveFloatingRange}.
 */
export function resolveIntegralRange(
    min: number,
    max: number,
    policy: InvalidIntegralRangeResult,
    logger: StochastLogger | null = null
): RangeResolution {
    if (!(min > max)) return { kind: 'range', min, max };

    if (policy === 'exception') {
        logger?.error?.(`[RNG] inverted integral range (${min} > ${max}) rejected by policy 'exception'`);
        throw new RangeInversionError(min, max);
    }
    logger?.warn?.(`[RNG] inverted integral range (${min} > ${max}) resolved by policy '${policy}'`);
    switch (policy) {
        case 'min_bound':
            return { kind: 'value', value: min };
        case 'zero':
            return { kind: 'value', value: 0 };
        case 'max_bound':
            return { kind: 'value', value: max };
        case 'swap':
            return { kind: 'range', min: max, max: min };
    }
}

export class RandomNumberGenerator {
    private readonly generator: BitGenerator;
    private readonly options: ResolvedRandomizeOptions;

    /** Word whose low bit is the next boolean. */
    private bitBuffer = 0;
    /** Booleans still available in `bitBuffer`. */
    private bitCount = 0;

    constructor(options: RandomizeOptions = {}, generator?: BitGenerator) {
        this.options = resolveRandomizeOptions(options);
        this.generator = generator ?? new MersenneTwister(this.options.seed);
    }

    get seed(): number {
        return this.generator.seed;
    }

    get invalidFloatingRange(): InvalidFloatingRangeResult {
        return this.options.invalidFloatingRange;
    }

    get invalidIntegralRange(): InvalidIntegralRangeResult {
        return this.options.invalidIntegralRange;
    }

    get logger(): StochastLogger | null {
        return this.options.logger;
    }

    /**
     * Non-negative integer below 2^31 - 1.
     */
    next(): number {
        let result: number;
        do {
            result = this.generator.nextInclusive();
        } while (result === INT32_MAX);
        return result;
    }

    /**
     * Integer in [0, max), or (max, 0] when `max` is negative.
     */
    nextInt(max: number): number;
    /**
     * Integer in [min, max). An inverted range follows `invalidIntegralRange`.
     */
    nextInt(min: number, max: number): number;
    nextInt(a: number, b?: number): number {
        if (b === undefined) {
            return Math.trunc(this.nextDouble() * a);
        }
        const range = resolveIntegralRange(a, b, this.options.invalidIntegralRange, this.options.logger);
        if (range.kind === 'value') return range.value;
        return range.min + Math.trunc(this.nextDouble() * (range.max - range.min));
    }

    /**
     * Integer in [0, 2^31 - 1], [0, max] or [min, max].
     */
    nextIntInclusive(): number;
    nextIntInclusive(max: number): number;
    nextIntInclusive(min: number, max: number): number;
    nextIntInclusive(a?: number, b?: number): number {
        if (a === undefined) {
            return this.generator.nextInclusive();
        }
        if (b === undefined) {
            if (a === 0) return 0;
            if (a === INT32_MAX) {
                return Math.trunc(this.nextDouble() * (INT32_MAX + 1.0));
            }
            return this.nextInt(a < 0 ? a - 1 : a + 1);
        }

        if (b < INT32_MAX) {
            return this.nextInt(a, b + 1);
        }
        if (a > INT32_MIN) {
            return this.nextInt(a - 1, b) + 1;
        }
        return INT32_MIN + Math.trunc(this.nextDouble((2.0 * INT32_MAX) + 1));
    }

    /**
     * Unsigned integer below 2^32 - 1.
     */
    nextUInt(): number;
    /** Unsigned integer in [0, max). */
    nextUInt(max: number): number;
    /** Unsigned integer in [min, max). An inverted range follows `invalidIntegralRange`. */
    nextUInt(min: number, max: number): number;
    nextUInt(a?: number, b?: number): number {
        if (a === undefined) {
            let result: number;
            do {
                result = this.generator.nextWord();
            } while (result === UINT32_MAX);
            return result;
        }
        if (b === undefined) {
            return Math.trunc(this.nextDouble() * a);
        }
        const range = resolveIntegralRange(a, b, this.options.invalidIntegralRange, this.options.logger);
        if (range.kind === 'value') return range.value;
        return range.min + Math.trunc(this.nextDouble() * (range.max - range.min));
    }

    /**
     * Unsigned integer in [0, 2^32 - 1], [0, max] or [min, max].
     */
    nextUIntInclusive(): number;
    nextUIntInclusive(max: number): number;
    nextUIntInclusive(min: number, max: number): number;
    nextUIntInclusive(a?: number, b?: number): number {
        if (a === undefined) {
            return this.generator.nextWord();
        }
        if (b === undefined) {
            if (a === 0) return 0;
            if (a === UINT32_MAX) {
                return Math.trunc(this.nextDouble() * (UINT32_MAX + 1.0));
            }
            return this.nextUInt(a + 1);
        }

        if (b < UINT32_MAX) {
            return this.nextUInt(a, b + 1);
        }
        if (a > 0) {
            return this.nextUInt(a - 1, b) + 1;
        }
        return this.generator.nextWord();
    }

    /**
     * One bit of a cached word per call; a fresh word is drawn every 32 calls.
     */
    nextBool(): boolean {
        if (this.bitCount === 0) {
            this.bitBuffer = this.nextUInt();
            this.bitCount = 31;
            return (this.bitBuffer & 0x1) === 1;
        }
        this.bitCount--;
        this.bitBuffer >>>= 1;
        return (this.bitBuffer & 0x1) === 1;
    }

    /**
     * Fills `buffer` four bytes per word, little-endian; a 1-3 byte tail takes one more word.
     */
    nextBytes(buffer: Uint8Array | null | undefined): void {
        if (!buffer) {
            throw new NullBufferError();
        }

        let i = 0;
        while (i < buffer.length - 3) {
            const u = this.nextUInt();
            buffer[i++] = u & 0xff;
            buffer[i++] = (u >>> 8) & 0xff;
            buffer[i++] = (u >>> 16) & 0xff;
            buffer[i++] = (u >>> 24) & 0xff;
        }
        if (i < buffer.length) {
            const u = this.nextUInt();
            let shift = 0;
            while (i < buffer.length) {
                buffer[i++] = (u >>> shift) & 0xff;
                shift += 8;
            }
        }
    }

    /**
     * Value in [0, 1).
     */
    nextDouble(): number;
    /**
     * Value between 0 and `max` (exclusive). NaN propagates; an infinite `max` is returned as is.
     */
    nextDouble(max: number): number;
    /**
     * Value in [min, max).
     *
     * NaN on either side yields NaN. An inverted range follows
     * `invalidFloatingRange`. An infinite bound is returned verbatim, except
     * that opposite infinities yield a randomly signed infinity.
     */
    nextDouble(min: number, max: number): number;
    nextDouble(a?: number, b?: number): number {
        if (a === undefined) {
            return this.generator.nextDouble();
        }
        if (b === undefined) {
            if (Number.isNaN(a)) return Number.NaN;
            if (!Number.isFinite(a)) return a;
            return this.generator.nextDouble() * a;
        }
        return this.nextDoubleInRange(a, b, this.options.invalidFloatingRange);
    }

    /**
     * {@link nextDouble} over [min, max) with an explicit inversion policy.
     */
    nextDoubleInRange(min: number, max: number, policy: InvalidFloatingRangeResult): number {
        if (Number.isNaN(min) || Number.isNaN(max)) {
            return Number.NaN;
        }
        const range = resolveFloatingRange(min, max, policy, this.options.logger);
        if (range.kind === 'value') return range.value;

        const lo = range.min;
        const hi = range.max;
        if (!Number.isFinite(lo)) {
            if (!Number.isFinite(hi) && Math.sign(lo) !== Math.sign(hi)) {
                return this.nextBool() ? Number.POSITIVE_INFINITY : Number.NEGATIVE_INFINITY;
            }
            return lo;
        }
        if (!Number.isFinite(hi)) {
            return hi;
        }
        return lo + (this.generator.nextDouble() * (hi - lo));
    }

    /**
     * Replays from `seed` (or the current seed). Clears the boolean cache first.
     */
    reset(seed?: number): void {
        this.bitBuffer = 0;
        this.bitCount = 0;
        if (seed === undefined) {
            this.generator.reset();
        } else {
            this.generator.reset(validateSeed(seed));
        }
        this.options.logger?.info?.(`[RNG] reset with seed ${this.generator.seed}`);
    }
}
