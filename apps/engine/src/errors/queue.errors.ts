/** Malformed submission. Nothing was written. */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

/** The subject already has a queued or processing task. */
export class DuplicateActiveJobError extends Error {
    constructor(public readonly subjectId: string) {
        super(`Subject ${subjectId} already has an active ingestion task`);
        this.name = 'DuplicateActiveJobError';
    }
}

export class TaskNotFoundError extends Error {
    constructor(public readonly taskId: string) {
        super(`Task ${taskId} not found`);
        this.name = 'TaskNotFoundError';
    }
}
