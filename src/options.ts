import { z } from 'zod';
import { InvalidOptionsError } from './errors.js';

export type StochastLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/**
 * What a bounded floating-point operation returns when `min > max`.
 *
 * - `min_bound` / `max_bound`: the corresponding bound
 * - `zero`: 0
 * - `swap`: draws from the swapped range
 * - `exception`: throws {@link RangeInversionError}
 * - `nan`: NaN
 */
export const INVALID_FLOATING_RANGE_RESULTS = ['min_bound', 'zero', 'max_bound', 'swap', 'exception', 'nan'] as const;
export type InvalidFloatingRangeResult = typeof INVALID_FLOATING_RANGE_RESULTS[number];

/** Integral counterpart of {@link InvalidFloatingRangeResult}; there is no integer NaN. */
export const INVALID_INTEGRAL_RANGE_RESULTS = ['min_bound', 'zero', 'max_bound', 'swap', 'exception'] as const;
export type InvalidIntegralRangeResult = typeof INVALID_INTEGRAL_RANGE_RESULTS[number];

export const UINT32_MAX = 0xFFFFFFFF;
export const INT32_MAX = 0x7FFFFFFF;
export const INT32_MIN = -0x80000000;

export type RangePolicyPreset = 'lenient' | 'strict' | 'symmetric';

export const RANGE_POLICY_PRESETS: Record<RangePolicyPreset, { invalidFloatingRange: InvalidFloatingRangeResult; invalidIntegralRange: InvalidIntegralRangeResult }> = {
    lenient:   { invalidFloatingRange: 'min_bound', invalidIntegralRange: 'min_bound' },
    strict:    { invalidFloatingRange: 'exception', invalidIntegralRange: 'exception' },
    symmetric: { invalidFloatingRange: 'swap',      invalidIntegralRange: 'swap' },
};

export type RandomizeOptions = {
    /** 32-bit unsigned seed. Omit for a seed drawn from system entropy. */
    seed?: number;
    /** Policy preset. Explicit policies below override it. */
    preset?: RangePolicyPreset;
    /** Result of a floating range whose minimum exceeds its maximum. Default: `min_bound`. */
    invalidFloatingRange?: InvalidFloatingRangeResult;
    /** Result of an integral range whose minimum exceeds its maximum. Default: `min_bound`. */
    invalidIntegralRange?: InvalidIntegralRangeResult;
    /** Optional logger hook; nothing in src/ writes to the console. */
    logger?: StochastLogger | null;
};

export type ResolvedRandomizeOptions = {
    seed: number | undefined;
    invalidFloatingRange: InvalidFloatingRangeResult;
    invalidIntegralRange: InvalidIntegralRangeResult;
    logger: StochastLogger | null;
};

export const SeedSchema = z.number().int().min(0).max(UINT32_MAX);

export const RandomizeOptionsSchema = z.object({
    seed: SeedSchema.optional(),
    preset: z.enum(['lenient', 'strict', 'symmetric']).optional(),
    invalidFloatingRange: z.enum(INVALID_FLOATING_RANGE_RESULTS).optional(),
    invalidIntegralRange: z.enum(INVALID_INTEGRAL_RANGE_RESULTS).optional(),
});

export function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validates caller options and fills in defaults.
 */
export function resolveRandomizeOptions(options: RandomizeOptions = {}): ResolvedRandomizeOptions {
    const parsed = RandomizeOptionsSchema.safeParse({
        seed: options.seed,
        preset: options.preset,
        invalidFloatingRange: options.invalidFloatingRange,
        invalidIntegralRange: options.invalidIntegralRange,
    });
    if (!parsed.success) {
        throw new InvalidOptionsError(describeIssues(parsed.error), parsed.error);
    }

    const preset = RANGE_POLICY_PRESETS[parsed.data.preset ?? 'lenient'];
    return {
        seed: parsed.data.seed,
        invalidFloatingRange: parsed.data.invalidFloatingRange ?? preset.invalidFloatingRange,
        invalidIntegralRange: parsed.data.invalidIntegralRange ?? preset.invalidIntegralRange,
        logger: options.logger ?? null,
    };
}

/**
 * Checks a seed passed outside the options object (e.g. to `reset`).
 */
export function validateSeed(seed: number): number {
    const parsed = SeedSchema.safeParse(seed);
    if (!parsed.success) {
        throw new InvalidOptionsError(`seed: ${parsed.error.issues[0]?.message ?? 'invalid'}`, parsed.error);
    }
    return parsed.data;
}
