import { z } from 'zod';
import { InvalidOptionsError, ParameterFormatError, UnknownFormatError } from '../errors.js';
import { describeIssues } from '../options.js';
import type { DistributionParameters } from '../stochast-types.js';
import { formatGeneral, parseGeneral } from './general-format.js';
import { DEFAULT_PARAMETERS, ZERO_PARAMETERS } from './parameters.js';
import { formatRoundTrip, parseRoundTrip } from './round-trip-format.js';

/**
 * `g`: general, human-readable, locale-sensitive.
 * `r`: round-trip, lossless and locale-independent.
 */
export type ParameterFormat = 'g' | 'r';

export type CodecOptions = {
    /** BCP 47 tag used by the general format. Omit for the host locale. */
    locale?: string;
};

export type ParseResult =
    | { success: true; value: DistributionParameters }
    | { success: false; value: DistributionParameters };

export const CodecOptionsSchema = z.object({
    locale: z.string().min(1).optional(),
});

function resolveCodecOptions(options: CodecOptions = {}): string | undefined {
    const parsed = CodecOptionsSchema.safeParse({ locale: options.locale });
    if (!parsed.success) {
        throw new InvalidOptionsError(describeIssues(parsed.error), parsed.error);
    }
    return parsed.data.locale;
}

/**
 * Normalizes a format specifier: case-insensitive, empty or absent means `g`.
 *
 * @throws UnknownFormatError for anything else
 */
export function resolveFormat(format: string | null | undefined): ParameterFormat {
    const normalized = (format ?? '').trim().toLowerCase();
    switch (normalized) {
        case '':
        case 'g':
            return 'g';
        case 'r':
            return 'r';
        default:
            throw new UnknownFormatError(format ?? '');
    }
}

function parseAs(text: string, format: ParameterFormat, locale: string | undefined): DistributionParameters | null {
    return format === 'r' ? parseRoundTrip(text) : parseGeneral(text, locale);
}

function parseAny(text: string, locale: string | undefined): DistributionParameters | null {
    return parseGeneral(text, locale) ?? parseRoundTrip(text);
}

/**
 * Reads `text` as the general format, then as the round-trip format.
 *
 * @throws ParameterFormatError when neither reads it
 */
export function parse(text: string, options?: CodecOptions): DistributionParameters {
    const value = parseAny(text, resolveCodecOptions(options));
    if (!value) {
        throw new ParameterFormatError(text);
    }
    return value;
}

/**
 * @throws UnknownFormatError for an unsupported `format`
 * @throws ParameterFormatError when `text` is not in that format
 */
export function parseExact(text: string, format: string, options?: CodecOptions): DistributionParameters {
    const value = parseAs(text, resolveFormat(format), resolveCodecOptions(options));
    if (!value) {
        throw new ParameterFormatError(text);
    }
    return value;
}

/**
 * Non-throwing {@link parse}. On failure `value` is {@link ZERO_PARAMETERS}.
 */
export function tryParse(text: string | null | undefined, options?: CodecOptions): ParseResult {
    const value = typeof text === 'string' ? parseAny(text, resolveCodecOptions(options)) : null;
    return value ? { success: true, value } : { success: false, value: ZERO_PARAMETERS };
}

/**
 * Non-throwing {@link parseExact}. On failure, including an unknown format,
 * `value` is {@link DEFAULT_PARAMETERS}.
 */
export function tryParseExact(text: string | null | undefined, format: string, options?: CodecOptions): ParseResult {
    if (typeof text !== 'string') {
        return { success: false, value: DEFAULT_PARAMETERS };
    }
    let resolved: ParameterFormat;
    try {
        resolved = resolveFormat(format);
    } catch (err) {
        if (err instanceof UnknownFormatError) {
            return { success: false, value: DEFAULT_PARAMETERS };
        }
        throw err;
    }
    const value = parseAs(text, resolved, resolveCodecOptions(options));
    return value ? { success: true, value } : { success: false, value: DEFAULT_PARAMETERS };
}

/**
 * @throws UnknownFormatError for an unsupported `format`
 */
export function formatParameters(value: DistributionParameters, format: string = 'g', options?: CodecOptions): string {
    return resolveFormat(format) === 'r'
        ? formatRoundTrip(value)
        : formatGeneral(value, resolveCodecOptions(options));
}
