/**
 * EditJob Entity
 *
 * Models the remote side of one edit: the handle returned on submission and
 * the status reported by each poll.
 */

/**
 * Returned by submission. Lives only for one edit call.
 */
export interface JobHandle {
    /** Remote job id, for log correlation */
    id: string;
    /** Opaque locator used for every status check */
    pollingUrl: string;
}

/**
 * Status of a job as seen by the client.
 * - pending: not ready, keep polling
 * - ready: terminal success, carries the result locator
 * - failed: terminal error reported by the service
 * - unknown: poll budget exhausted; only the poll loop produces this
 */
export type JobStatus =
    | { kind: 'pending'; raw?: string }
    | { kind: 'ready'; resultUrl: string }
    | { kind: 'failed'; reason: string }
    | { kind: 'unknown' };

/** What a single poll response can say; 'unknown' is never reported by the service. */
export type PollStatus = Exclude<JobStatus, { kind: 'unknown' }>;

export const DEFAULT_FAILURE_REASON = 'Unknown error';
export const MISSING_RESULT_REASON = 'No image URL in ready response';

/** Status literals the service uses for a failed job. */
const FAILURE_STATUSES = new Set(['Error', 'Failed']);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
    return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

/**
 * Extracts the job handle from a submission response body.
 * Returns null when the polling locator is missing.
 */
export function parseJobHandle(data: unknown): JobHandle | null {
    if (!isRecord(data)) {
        return null;
    }
    const pollingUrl = nonEmptyString(data.polling_url);
    if (!pollingUrl) {
        return null;
    }
    return {
        id: nonEmptyString(data.id) ?? 'unknown',
        pollingUrl,
    };
}

/**
 * Classifies one poll response body into exactly one status.
 *
 * Only "Ready", "Error" and "Failed" are acted on. Every other value,
 * including moderation literals, a missing status, or a malformed body,
 * is treated as pending and left to the poll budget.
 */
export function classifyPollResponse(data: unknown): PollStatus {
    if (!isRecord(data)) {
        return { kind: 'pending' };
    }

    const status = typeof data.status === 'string' ? data.status : undefined;

    if (status === 'Ready') {
        const result = isRecord(data.result) ? data.result : undefined;
        const resultUrl = result ? nonEmptyString(result.sample) : undefined;
        if (!resultUrl) {
            return { kind: 'failed', reason: MISSING_RESULT_REASON };
        }
        return { kind: 'ready', resultUrl };
    }

    if (status !== undefined && FAILURE_STATUSES.has(status)) {
        return {
            kind: 'failed',
            reason: nonEmptyString(data.failure_reason) ?? DEFAULT_FAILURE_REASON,
        };
    }

    return { kind: 'pending', raw: status };
}
