/**
 * Shared numeric helpers.
 *
 * `NEARLY_ZERO` is the smallest magnitude treated as strictly positive. Shape
 * parameters that must be positive (sigma, lambda) are clamped to it instead
 * of zero so downstream transforms never divide by zero.
 */

export const NEARLY_ZERO = 1e-15;

/** 2^31, the divisor that maps a 31-bit integer into [0, 1). */
export const INT_TO_DOUBLE_DIVISOR = 2147483648;

export const LN2 = Math.LN2;
export const PI_SQUARED = Math.PI * Math.PI;

export function isNearlyZero(value: number): boolean {
    return Math.abs(value) < NEARLY_ZERO;
}

/**
 * Relative comparison; exact equality (including equal infinities) always holds.
 */
export function isNearlyEqual(a: number, b: number): boolean {
    if (a === b) return true;
    if (!Number.isFinite(a) || !Number.isFinite(b)) return false;

    const diff = Math.abs(a - b);
    if (a === 0 || b === 0) {
        return diff < NEARLY_ZERO;
    }
    return diff / (Math.abs(a) + Math.abs(b)) < NEARLY_ZERO;
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

export function square(value: number): number {
    return value * value;
}

/**
 * Clamps a positive shape parameter (sigma, lambda). NaN passes through.
 */
export function clampPositive(value: number): number {
    if (Number.isNaN(value)) return value;
    return Math.max(NEARLY_ZERO, value);
}

/**
 * Rounds to `precision` decimal places; non-finite values pass through.
 */
export function roundToPrecision(value: number, precision: number): number {
    if (!Number.isFinite(value)) return value;
    return Number(value.toFixed(Math.min(precision, 100)));
}
