/**
 * Raised by pipelines to signal a failed run. `retryable` decides whether the
 * engine puts the task back in the queue or fails it straight away.
 */
export class PipelineError extends Error {
    readonly retryable: boolean;

    constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'PipelineError';
        this.retryable = options.retryable ?? true;
    }
}

/** Unsupported input, corrupt payload: retrying cannot help. */
export class PermanentPipelineError extends PipelineError {
    constructor(message: string, cause?: unknown) {
        super(message, { retryable: false, cause });
        this.name = 'PermanentPipelineError';
    }
}

export interface ErrorInfo {
    message: string;
    name: string;
    retryable: boolean;
}

// Errors lose their prototype when they cross a thread or the wire
export function toErrorInfo(err: unknown): ErrorInfo {
    if (err instanceof PipelineError) {
        return { message: err.message, name: err.name, retryable: err.retryable };
    }
    if (err instanceof Error) {
        return { message: err.message, name: err.name, retryable: true };
    }
    return { message: String(err), name: 'Error', retryable: true };
}

export function fromErrorInfo(info: ErrorInfo): PipelineError {
    const err = info.retryable
        ? new PipelineError(info.message, { retryable: true })
        : new PermanentPipelineError(info.message);
    err.name = info.name;
    return err;
}
