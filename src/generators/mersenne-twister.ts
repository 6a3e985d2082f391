/**
 * MT19937 word generator (period 2^19937 - 1).
 *
 * Reproduces the reference `init_genrand` / `genrand_int32` sequence, so a
 * given seed yields the same words on every platform and every run.
 *
 * A generator is single-owner: Node runs it on one thread and no draw
 * suspends, so state mutation never interleaves. Worker threads must each
 * construct their own instance.
 */

import { INT_TO_DOUBLE_DIVISOR } from '../stochast-utils.js';
import { systemSeedSource, type SeedSource } from './seed.js';

const N = 624;
const M = 397;

const UPPER_MASK = 0x80000000;
const LOWER_MASK = 0x7fffffff;
const MAG01 = [0x0, 0x9908b0df] as const;

export interface BitGenerator {
    readonly seed: number;
    /** Tempered 32-bit unsigned word. */
    nextWord(): number;
    /** Non-negative integer in [0, 2^31 - 1]. */
    nextInclusive(): number;
    /** Floating-point value in [0, 1). */
    nextDouble(): number;
    /** Replays the sequence from `seed`, or from the current seed when omitted. */
    reset(seed?: number): void;
}

export class MersenneTwister implements BitGenerator {
    private readonly mt = new Uint32Array(N);
    private mti = N;
    private currentSeed = 0;

    constructor(seed?: number, seedSource: SeedSource = systemSeedSource) {
        this.reset(seed ?? seedSource());
    }

    get seed(): number {
        return this.currentSeed;
    }

    nextWord(): number {
        if (this.mti >= N) {
            this.twist();
        }
        let y = this.mt[this.mti++];

        y ^= y >>> 11;
        y ^= (y << 7) & 0x9d2c5680;
        y ^= (y << 15) & 0xefc60000;
        return (y ^ (y >>> 18)) >>> 0;
    }

    nextInclusive(): number {
        return this.nextWord() >>> 1;
    }

    nextDouble(): number {
        return (this.nextWord() >>> 1) / INT_TO_DOUBLE_DIVISOR;
    }

    reset(seed: number = this.currentSeed): void {
        const s = seed >>> 0;
        this.currentSeed = s;

        this.mt[0] = s;
        for (let i = 1; i < N; i++) {
            const prev = this.mt[i - 1] ^ (this.mt[i - 1] >>> 30);
            this.mt[i] = (Math.imul(1812433253, prev) + i) >>> 0;
        }
        this.mti = N;
    }

    /**
     * Regenerates the whole state block. The cursor only rewinds once every
     * word has been rewritten.
     */
    private twist(): void {
        const mt = this.mt;
        let kk = 0;
        let y: number;

        for (; kk < N - M; kk++) {
            y = (mt[kk] & UPPER_MASK) | (mt[kk + 1] & LOWER_MASK);
            mt[kk] = mt[kk + M] ^ (y >>> 1) ^ MAG01[y & 0x1];
        }
        for (; kk < N - 1; kk++) {
            y = (mt[kk] & UPPER_MASK) | (mt[kk + 1] & LOWER_MASK);
            mt[kk] = mt[kk + (M - N)] ^ (y >>> 1) ^ MAG01[y & 0x1];
        }
        y = (mt[N - 1] & UPPER_MASK) | (mt[0] & LOWER_MASK);
        mt[N - 1] = mt[M - 1] ^ (y >>> 1) ^ MAG01[y & 0x1];

        this.mti = 0;
    }
}
