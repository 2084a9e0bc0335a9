export type DistributionErrorKind = 'not-implemented' | 'type' | 'range';

/**
 * Base class for every error thrown by the distribution types.
 * All of them are synchronous and deterministic, so none is worth retrying.
 */
export class DistributionError extends Error {
    readonly kind: DistributionErrorKind;

    constructor(kind: DistributionErrorKind, message: string) {
        super(message);
        this.name = new.target.name;
        this.kind = kind;
    }
}

export class LikelihoodNotImplementedError extends DistributionError {
    constructor() {
        super('not-implemented', 'No likelihood was supplied to this updater');
    }
}

export class NonNumericHypothesisError extends DistributionError {
    readonly hypothesis: unknown;

    constructor(hypothesis: unknown, operation: string) {
        super('type', `Can't compute ${operation} of non-numeric hypothesis ${JSON.stringify(hypothesis)}`);
        this.hypothesis = hypothesis;
    }
}

export class EmptyDistributionError extends DistributionError {
    constructor(operation: string) {
        super('range', `Can't ${operation} an empty distribution`);
    }
}

export class PercentileRangeError extends DistributionError {
    readonly value: number;

    constructor(value: number, upperBound: number) {
        super('range', `Probability ${value} is outside [0, ${upperBound}]`);
        this.value = value;
    }
}

export class DistributionRangeError extends DistributionError {
    constructor(message: string) {
        super('range', message);
    }
}

export function isDistributionError(error: unknown): error is DistributionError {
    return error instanceof DistributionError;
}
