/**
 * General ("g") grammar, meant for display:
 *
 *   <KindName> distribution (<minimum>;<maximum>) [<shape0>;<shape1>...] r:<precision>
 *
 * Numbers carry two decimals in the caller's locale, so this form is not
 * lossless. Each of the three groups is left out when it has nothing to say.
 */

import { InvalidOptionsError, StochastError } from '../errors.js';
import { DistributionType, type DistributionParameters } from '../stochast-types.js';
import { fromShapeValues, shapeValues } from './parameters.js';

const KIND_SUFFIX = 'distribution';
const VALUE_SEPARATOR = ';';

const GENERAL_PATTERN = /^([A-Za-z]+)\s+distribution(?:\s*\(([^()]*)\))?(?:\s*\[([^[\]]*)\])?(?:\s*r:\s*(\d{1,3}))?$/i;
const PLAIN_DECIMAL = /^(?:\d+\.?\d*|\.\d+)$/;
const DIRECTION_MARKS = /[\u200e\u200f\u061c]/g;
const WHITESPACE = /\s/g;

const KIND_BY_NAME = new Map<string, DistributionType>();
for (const value of Object.values(DistributionType)) {
    if (typeof value === 'number') {
        KIND_BY_NAME.set(DistributionType[value].toLowerCase(), value);
    }
}

/** Symbols one locale uses when writing numbers. */
export interface LocaleGlyphs {
    readonly decimal: string;
    readonly group: string;
    readonly minus: string;
    readonly infinity: string;
    readonly nan: string;
    /** Glyphs for 0 through 9. */
    readonly digits: readonly string[];
}

const formatterCache = new Map<string, Intl.NumberFormat>();
const glyphCache = new Map<string, LocaleGlyphs>();

function cacheKey(locale: string | undefined): string {
    return locale ?? '';
}

function createNumberFormat(locale: string | undefined, options: Intl.NumberFormatOptions): Intl.NumberFormat {
    try {
        return new Intl.NumberFormat(locale, options);
    } catch (err) {
        throw new InvalidOptionsError(`locale: unsupported value '${locale}'`, err);
    }
}

function displayFormat(locale: string | undefined): Intl.NumberFormat {
    const key = cacheKey(locale);
    let formatter = formatterCache.get(key);
    if (!formatter) {
        formatter = createNumberFormat(locale, {
            minimumFractionDigits: 2,
            maximumFractionDigits: 2,
            useGrouping: false,
        });
        formatterCache.set(key, formatter);
    }
    return formatter;
}

function partOf(parts: Intl.NumberFormatPart[], type: Intl.NumberFormatPartTypes, fallback: string): string {
    return parts.find(part => part.type === type)?.value ?? fallback;
}

export function localeGlyphs(locale?: string): LocaleGlyphs {
    const key = cacheKey(locale);
    const cached = glyphCache.get(key);
    if (cached) return cached;

    const grouped = createNumberFormat(locale, { minimumFractionDigits: 1, useGrouping: true });
    const sample = grouped.formatToParts(-1234567.5);
    const plain = createNumberFormat(locale, { useGrouping: false, maximumFractionDigits: 0 });

    const glyphs: LocaleGlyphs = {
        decimal: partOf(sample, 'decimal', '.'),
        group: partOf(sample, 'group', ''),
        minus: partOf(sample, 'minusSign', '-'),
        infinity: partOf(grouped.formatToParts(Number.POSITIVE_INFINITY), 'infinity', '∞'),
        nan: partOf(grouped.formatToParts(Number.NaN), 'nan', 'NaN'),
        digits: Array.from({ length: 10 }, (_, d) => plain.format(d)),
    };
    glyphCache.set(key, glyphs);
    return glyphs;
}

export function formatGeneralNumber(value: number, locale?: string): string {
    return displayFormat(locale).format(value);
}

/**
 * Reads one number written in `locale`. The invariant words `Infinity` and
 * `NaN` are accepted in every locale.
 */
export function parseGeneralNumber(token: string, locale?: string): number | null {
    const glyphs = localeGlyphs(locale);
    let text = token.replace(DIRECTION_MARKS, '').replace(WHITESPACE, '');

    glyphs.digits.forEach((glyph, digit) => {
        if (glyph !== String(digit)) {
            text = text.split(glyph).join(String(digit));
        }
    });

    let negative = false;
    if (text.startsWith(glyphs.minus) || text.startsWith('-') || text.startsWith('\u2212')) {
        negative = true;
        text = text.slice(text.startsWith(glyphs.minus) ? glyphs.minus.length : 1);
    } else if (text.startsWith('+')) {
        text = text.slice(1);
    }

    if (text === glyphs.infinity || text === 'Infinity' || text === '∞') {
        return negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
    }
    if (text === glyphs.nan || text === 'NaN') {
        return Number.NaN;
    }

    if (glyphs.group !== '' && glyphs.group !== glyphs.decimal) {
        text = text.split(glyphs.group).join('');
    }
    if (glyphs.decimal !== '.') {
        if (text.includes('.')) return null;
        text = text.split(glyphs.decimal).join('.');
    }
    if (!PLAIN_DECIMAL.test(text)) return null;

    const value = Number(text);
    return negative ? -value : value;
}

export function formatGeneral(parameters: DistributionParameters, locale?: string): string {
    const format = (value: number): string => formatGeneralNumber(value, locale);
    const parts = [`${DistributionType[parameters.type]} ${KIND_SUFFIX}`];

    if (parameters.minimum !== null || parameters.maximum !== null) {
        const minimum = format(parameters.minimum ?? Number.NEGATIVE_INFINITY);
        const maximum = format(parameters.maximum ?? Number.POSITIVE_INFINITY);
        parts.push(`(${minimum}${VALUE_SEPARATOR}${maximum})`);
    }

    const shape = shapeValues(parameters);
    if (shape.length > 0) {
        parts.push(`[${shape.map(format).join(VALUE_SEPARATOR)}]`);
    }

    if (parameters.precision !== null) {
        parts.push(`r:${parameters.precision}`);
    }
    return parts.join(' ');
}

function parseNumberList(field: string, locale: string | undefined): number[] | null {
    if (field.trim() === '') return [];
    const values: number[] = [];
    for (const token of field.split(VALUE_SEPARATOR)) {
        const value = parseGeneralNumber(token, locale);
        if (value === null) return null;
        values.push(value);
    }
    return values;
}

/**
 * Reads a general-format string. A missing `(...)` group leaves both bounds
 * open; a missing `[...]` group takes the kind's default shape fields.
 * Returns `null` for anything malformed.
 */
export function parseGeneral(text: string, locale?: string): DistributionParameters | null {
    const match = GENERAL_PATTERN.exec(text.trim());
    if (!match) return null;
    const [, kindName, boundsGroup, shapeGroup, precisionGroup] = match;

    const type = KIND_BY_NAME.get(kindName.toLowerCase());
    if (type === undefined) return null;

    let minimum: number | null = null;
    let maximum: number | null = null;
    if (boundsGroup !== undefined) {
        const bounds = boundsGroup.split(VALUE_SEPARATOR);
        if (bounds.length !== 2) return null;
        minimum = parseGeneralNumber(bounds[0], locale);
        maximum = parseGeneralNumber(bounds[1], locale);
        if (minimum === null || maximum === null) return null;
    }

    let shape: number[] | null = null;
    if (shapeGroup !== undefined) {
        shape = parseNumberList(shapeGroup, locale);
        if (shape === null) return null;
    }

    const precision = precisionGroup === undefined ? null : Number(precisionGroup);

    try {
        return fromShapeValues(type, shape, { minimum, maximum, precision });
    } catch (err) {
        if (err instanceof StochastError) return null;
        throw err;
    }
}
