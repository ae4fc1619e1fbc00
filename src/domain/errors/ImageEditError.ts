/**
 * Failure kinds of one edit job. All four are terminal for the job and
 * collapse to "no result" for the chat user.
 */
export type ImageEditErrorKind =
    | 'submission_failed'
    | 'job_failed'
    | 'job_timed_out'
    | 'result_fetch_failed';

export abstract class ImageEditError extends Error {
    abstract readonly kind: ImageEditErrorKind;

    constructor(
        message: string,
        public readonly jobId?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Transport error, non-2xx, or missing polling_url on the initial POST.
 */
export class SubmissionFailedError extends ImageEditError {
    readonly kind = 'submission_failed' as const;

    constructor(message: string, options?: { cause?: unknown }) {
        super(`Edit submission failed: ${message}`, undefined, options);
    }
}

/**
 * The service reported the job as failed.
 */
export class JobFailedError extends ImageEditError {
    readonly kind = 'job_failed' as const;

    constructor(public readonly reason: string, jobId: string) {
        super(`Edit job ${jobId} failed: ${reason}`, jobId);
    }
}

export class JobTimedOutError extends ImageEditError {
    readonly kind = 'job_timed_out' as const;

    constructor(public readonly polls: number, jobId: string) {
        super(`Edit job ${jobId} timed out after ${polls} polls`, jobId);
    }
}

export class ResultFetchFailedError extends ImageEditError {
    readonly kind = 'result_fetch_failed' as const;

    constructor(message: string, jobId: string, options?: { cause?: unknown }) {
        super(`Failed to download edited image for ${jobId}: ${message}`, jobId, options);
    }
}
