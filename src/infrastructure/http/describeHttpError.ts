import axios from 'axios';

/**
 * One-line summary of a failed HTTP call: status or error code plus message.
 * Leaves out the request config, whose URL and headers may carry credentials.
 */
export function describeHttpError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        return status ? `HTTP ${status}: ${error.message}` : `${error.code ?? 'network error'}: ${error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
}
