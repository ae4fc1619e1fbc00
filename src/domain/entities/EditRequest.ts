import { AspectRatioLabel, isAspectRatioLabel } from './AspectRatio';

/**
 * Output encodings the edit endpoint can return.
 */
export type OutputFormat = 'jpeg' | 'png';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['jpeg', 'png'];

/** Moderation strictness accepted by the API, 0 (strict) to 6 (permissive). */
export const MIN_SAFETY_TOLERANCE = 0;
export const MAX_SAFETY_TOLERANCE = 6;

export function isOutputFormat(value: string): value is OutputFormat {
    return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * EditRequest is one user's "edit this image like so" action.
 * Created per instruction, discarded once the job settles.
 */
export interface EditRequest {
    /** Local correlation id, used in logs before the remote job id exists */
    readonly id: string;
    /** Source image bytes */
    readonly image: Buffer;
    /** Natural-language edit instruction */
    readonly prompt: string;
    readonly aspectRatio: AspectRatioLabel;
    readonly outputFormat: OutputFormat;
    readonly safetyTolerance: number;
}

export interface EditRequestInput {
    image: Buffer;
    prompt: string;
    aspectRatio: string;
    outputFormat: OutputFormat;
    safetyTolerance: number;
}

/**
 * Creates a frozen EditRequest, rejecting input the edit endpoint would refuse.
 */
export function createEditRequest(id: string, input: EditRequestInput): EditRequest {
    if (!id.trim()) {
        throw new Error('EditRequest id cannot be empty');
    }
    if (input.image.length === 0) {
        throw new Error('EditRequest image cannot be empty');
    }
    const prompt = input.prompt.trim();
    if (!prompt) {
        throw new Error('EditRequest prompt cannot be empty');
    }
    if (!isAspectRatioLabel(input.aspectRatio)) {
        throw new Error(`Unsupported aspect ratio: ${input.aspectRatio}`);
    }
    if (
        !Number.isInteger(input.safetyTolerance) ||
        input.safetyTolerance < MIN_SAFETY_TOLERANCE ||
        input.safetyTolerance > MAX_SAFETY_TOLERANCE
    ) {
        throw new Error(
            `Safety tolerance must be an integer between ${MIN_SAFETY_TOLERANCE} and ${MAX_SAFETY_TOLERANCE}, got: ${input.safetyTolerance}`
        );
    }

    return Object.freeze({
        id: id.trim(),
        image: input.image,
        prompt,
        aspectRatio: input.aspectRatio,
        outputFormat: input.outputFormat,
        safetyTolerance: input.safetyTolerance,
    });
}
