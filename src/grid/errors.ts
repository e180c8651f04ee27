export class GridError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'GridError';
    }
}

/** Malformed trajectory input or measures table. */
export class ValidationError extends GridError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'ValidationError';
    }
}

/** Quantization cannot be resolved for the observed values. */
export class ConfigError extends GridError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'ConfigError';
    }
}

export class ComputeError extends GridError {
    constructor(message: string) {
        super(message);
        this.name = 'ComputeError';
    }
}
