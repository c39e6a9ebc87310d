export class PipelineError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

export class ConfigurationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class InfrastructureError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class FfmpegNotFoundError extends InfrastructureError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/** Artifact read/write failure (disk full, permission denied, missing file). */
export class StorageError extends InfrastructureError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/** Malformed or missing input. Raised before a job exists, or while checking options. */
export class ValidationError extends PipelineError {
    readonly code: string;

    constructor(message: string, code = 'validation_failed', options?: ErrorOptions) {
        super(message, options);
        this.code = code;
    }
}

export class NotFoundError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/** The request is well-formed but the job is not in a state that allows it. */
export class ConflictError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/** Internal invariant violation in the job state machine. Never retryable. */
export class IllegalTransitionError extends PipelineError {
    readonly from: string;
    readonly to: string;

    constructor(from: string, to: string, options?: ErrorOptions) {
        super(`Invalid job state transition: ${from} -> ${to}`, options);
        this.from = from;
        this.to = to;
    }
}

export class GenerationError extends PipelineError {
    readonly backend: string;
    readonly diagnostic?: string;

    constructor(backend: string, message: string, diagnostic?: string, options?: ErrorOptions) {
        super(message, options);
        this.backend = backend;
        this.diagnostic = diagnostic;
    }
}

export class TimeoutError extends PipelineError {
    readonly timeoutMs: number;

    constructor(timeoutMs: number, options?: ErrorOptions) {
        super(`Job exceeded its time budget of ${timeoutMs}ms`, options);
        this.timeoutMs = timeoutMs;
    }
}

export class CancelledError extends PipelineError {
    constructor(message = 'Job was cancelled', options?: ErrorOptions) {
        super(message, options);
    }
}
