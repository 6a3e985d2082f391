/**
 * Error taxonomy for the generator, the samplers and the parameter codec.
 *
 * Message texts live in {@link ERROR_MESSAGES} so every throw site reports the
 * same wording for the same condition.
 */

export const ERROR_MESSAGES = {
    MIN_ABOVE_MAX: 'The minimum bound cannot be greater than the maximum bound.',
    NULL_BUFFER: 'Buffer cannot be null.',
    TOTAL_WEIGHT_IS_ZERO: 'Total weight cannot be zero.',
    INVALID_FORMAT: 'The input string was not in a recognized distribution parameter format.',
    UNKNOWN_FORMAT: 'The provided format is unrecognized.',
    INVALID_OPTIONS: 'Invalid generator options.',
    INVALID_PRECISION: 'Precision must be an integer between 0 and 255.',
    INVALID_TRIAL_COUNT: 'The number of trials must be an integer between 0 and 4294967295.',
} as const;

export class StochastError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'StochastError';
    }
}

export class RangeInversionError extends StochastError {
    constructor(public readonly minimum: number, public readonly maximum: number) {
        super(`${ERROR_MESSAGES.MIN_ABOVE_MAX} (${minimum} > ${maximum})`);
        this.name = 'RangeInversionError';
    }
}

export class ZeroWeightError extends StochastError {
    constructor() {
        super(ERROR_MESSAGES.TOTAL_WEIGHT_IS_ZERO);
        this.name = 'ZeroWeightError';
    }
}

export class NullBufferError extends StochastError {
    constructor() {
        super(ERROR_MESSAGES.NULL_BUFFER);
        this.name = 'NullBufferError';
    }
}

export class ParameterFormatError extends StochastError {
    constructor(public readonly input: string) {
        super(ERROR_MESSAGES.INVALID_FORMAT);
        this.name = 'ParameterFormatError';
    }
}

export class UnknownFormatError extends StochastError {
    constructor(public readonly format: string) {
        super(`${ERROR_MESSAGES.UNKNOWN_FORMAT} ('${format}')`);
        this.name = 'UnknownFormatError';
    }
}

export class InvalidOptionsError extends StochastError {
    constructor(detail: string, originalError?: unknown) {
        super(`${ERROR_MESSAGES.INVALID_OPTIONS} ${detail}`, originalError);
        this.name = 'InvalidOptionsError';
    }
}
