export class AricodeError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'AricodeError';
    }
}

/**
 * The working interval (or a symbol band) collapsed to zero width before the
 * whole sequence was consumed. Retrying needs a larger precision.
 */
export class PrecisionInsufficientError extends AricodeError {
    constructor(message: string, public readonly symbolIndex: number, public readonly precision: number) {
        super(message);
        this.name = 'PrecisionInsufficientError';
    }
}

export class CorruptArtifactError extends AricodeError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'CorruptArtifactError';
    }
}

export class IncompleteDataError extends CorruptArtifactError {
    constructor(message: string) {
        super(message);
        this.name = 'IncompleteDataError';
    }
}

export class IntegrityError extends CorruptArtifactError {
    constructor(message: string) {
        super(message);
        this.name = 'IntegrityError';
    }
}

export class PrecisionMismatchError extends CorruptArtifactError {
    constructor(public readonly expected: number, public readonly actual: number) {
        super(`Precision mismatch: artifact was encoded with ${actual} digits, decoder configured for ${expected}`);
        this.name = 'PrecisionMismatchError';
    }
}

export class LimitExceededError extends AricodeError {
    constructor(message: string) {
        super(message);
        this.name = 'LimitExceededError';
    }
}

export class InvalidOptionError extends AricodeError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidOptionError';
    }
}
