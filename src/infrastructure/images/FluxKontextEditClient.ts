import axios from 'axios';
import { IImageEditClient } from '../../domain/ports/IImageEditClient';
import { EditRequest } from '../../domain/entities/EditRequest';
import { JobHandle, JobStatus, classifyPollResponse, parseJobHandle } from '../../domain/entities/EditJob';
import {
    JobFailedError,
    JobTimedOutError,
    ResultFetchFailedError,
    SubmissionFailedError,
} from '../../domain/errors/ImageEditError';
import { describeHttpError } from '../http/describeHttpError';

export const DEFAULT_FLUX_KONTEXT_URL = 'https://api.bfl.ai/v1/flux-kontext-pro';

export interface FluxKontextEditOptions {
    apiUrl?: string;
    /** Poll budget; the job times out after this many status checks */
    maxPolls?: number;
    /** Fixed wait before every status check */
    pollIntervalMs?: number;
    /** Per-request HTTP timeout */
    requestTimeoutMs?: number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * FLUX Kontext image edit client (Black Forest Labs API).
 *
 * Submission returns a polling URL rather than the image, so one edit is
 * submit, then poll at a fixed interval until Ready/Failed or the budget
 * runs out, then download the sample. Worst case is roughly
 * maxPolls * pollIntervalMs plus submit and download latency.
 */
export class FluxKontextEditClient implements IImageEditClient {
    private readonly apiKey: string;
    private readonly apiUrl: string;
    private readonly maxPolls: number;
    private readonly pollIntervalMs: number;
    private readonly requestTimeoutMs: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(apiKey: string, options: FluxKontextEditOptions = {}) {
        if (!apiKey) {
            throw new Error('BFL API key is required');
        }
        this.apiKey = apiKey;
        this.apiUrl = options.apiUrl ?? DEFAULT_FLUX_KONTEXT_URL;
        this.maxPolls = options.maxPolls ?? 60;
        this.pollIntervalMs = options.pollIntervalMs ?? 2000;
        this.requestTimeoutMs = options.requestTimeoutMs ?? 30000;
        this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));

        if (!Number.isInteger(this.maxPolls) || this.maxPolls < 1) {
            throw new Error(`maxPolls must be a positive integer, got: ${this.maxPolls}`);
        }
    }

    async editImage(request: EditRequest): Promise<Buffer> {
        const handle = await this.submit(request);
        console.log(`[FluxKontext] Request ${handle.id} created, polling for result...`);

        const status = await this.pollUntilTerminal(handle);
        switch (status.kind) {
            case 'ready':
                return this.fetchResult(status.resultUrl, handle.id);
            case 'failed':
                throw new JobFailedError(status.reason, handle.id);
            case 'pending':
            case 'unknown':
                throw new JobTimedOutError(this.maxPolls, handle.id);
        }
    }

    private headers(): Record<string, string> {
        return {
            'accept': 'application/json',
            'x-key': this.apiKey,
            'Content-Type': 'application/json',
        };
    }

    private async submit(request: EditRequest): Promise<JobHandle> {
        console.log(`[FluxKontext] Starting edit ${request.id} (${request.aspectRatio}) with prompt: ${request.prompt.substring(0, 50)}...`);

        let data: unknown;
        try {
            const response = await axios.post(
                this.apiUrl,
                {
                    prompt: request.prompt,
                    input_image: request.image.toString('base64'),
                    aspect_ratio: request.aspectRatio,
                    output_format: request.outputFormat,
                    safety_tolerance: request.safetyTolerance,
                },
                {
                    headers: this.headers(),
                    timeout: this.requestTimeoutMs,
                }
            );
            data = response.data;
        } catch (error) {
            const message = describeHttpError(error);
            console.error(`[FluxKontext] Submission failed for ${request.id}: ${message}`);
            throw new SubmissionFailedError(message, { cause: error });
        }

        const handle = parseJobHandle(data);
        if (!handle) {
            console.error(`[FluxKontext] No polling URL received: ${JSON.stringify(data).substring(0, 300)}`);
            throw new SubmissionFailedError('response did not include a polling_url');
        }
        return handle;
    }

    /**
     * Polls until Ready or Failed, or returns 'unknown' once the budget is spent.
     * A failed status check is logged and still counts against the budget.
     */
    private async pollUntilTerminal(handle: JobHandle): Promise<JobStatus> {
        for (let attempt = 1; attempt <= this.maxPolls; attempt++) {
            await this.sleep(this.pollIntervalMs);

            let data: unknown;
            try {
                const response = await axios.get(handle.pollingUrl, {
                    headers: this.headers(),
                    timeout: this.requestTimeoutMs,
                });
                data = response.data;
            } catch (error) {
                console.warn(`[FluxKontext] Polling error for ${handle.id} (Attempt ${attempt}/${this.maxPolls}): ${describeHttpError(error)}`);
                continue;
            }

            const status = classifyPollResponse(data);
            if (status.kind === 'ready') {
                console.log(`[FluxKontext] Request ${handle.id} ready after ${attempt} polls`);
                return status;
            }
            if (status.kind === 'failed') {
                console.error(`[FluxKontext] Request ${handle.id} failed: ${status.reason}`);
                return status;
            }
            if (attempt % 3 === 0) {
                console.log(`[FluxKontext] Request ${handle.id} status: ${status.raw ?? 'none'} (Attempt ${attempt}/${this.maxPolls})...`);
            }
        }

        console.error(`[FluxKontext] Request ${handle.id} timed out after ${this.maxPolls} polls`);
        return { kind: 'unknown' };
    }

    private async fetchResult(resultUrl: string, jobId: string): Promise<Buffer> {
        try {
            const response = await axios.get<ArrayBuffer>(resultUrl, {
                responseType: 'arraybuffer',
                timeout: this.requestTimeoutMs,
            });
            const image = Buffer.from(response.data);
            console.log(`[FluxKontext] Successfully retrieved edited image for ${jobId} (${image.length} bytes)`);
            return image;
        } catch (error) {
            const message = describeHttpError(error);
            console.error(`[FluxKontext] Result download failed for ${jobId}: ${message}`);
            throw new ResultFetchFailedError(message, jobId, { cause: error });
        }
    }
}
