import { v4 as uuidv4 } from 'uuid';
import { AspectRatioLabel, classifyAspectRatio } from '../domain/entities/AspectRatio';
import { OutputFormat, createEditRequest } from '../domain/entities/EditRequest';
import { ImageEditError } from '../domain/errors/ImageEditError';
import { IImageEditClient } from '../domain/ports/IImageEditClient';
import { IImageInspector } from '../domain/ports/IImageInspector';
import { ConversationContext } from './ConversationContext';

export interface PhotoEditPolicy {
    maxImageSizeMb: number;
    defaultAspectRatio: AspectRatioLabel;
    outputFormat: OutputFormat;
    safetyTolerance: number;
}

export type StashResult =
    | { ok: true; aspectRatio: AspectRatioLabel }
    | { ok: false; reason: 'too_large'; sizeMb: number };

/**
 * Connects chat turns to the edit job client.
 *
 * A received photo is measured and stashed in the conversation context;
 * each later instruction runs one edit job against that stashed photo.
 */
export class PhotoEditService {
    constructor(
        private readonly editClient: IImageEditClient,
        private readonly inspector: IImageInspector,
        private readonly policy: PhotoEditPolicy
    ) { }

    isWithinSizeLimit(image: Buffer): boolean {
        const sizeMb = image.length / (1024 * 1024);
        if (sizeMb > this.policy.maxImageSizeMb) {
            console.warn(`[PhotoEdit] Image size ${sizeMb.toFixed(2)}MB exceeds limit ${this.policy.maxImageSizeMb}MB`);
            return false;
        }
        return true;
    }

    /**
     * Closest supported ratio for the image, or the configured default
     * when the bytes cannot be inspected.
     */
    detectAspectRatio(image: Buffer): AspectRatioLabel {
        try {
            const { width, height } = this.inspector.getDimensions(image);
            const aspectRatio = classifyAspectRatio(width, height);
            console.log(`[PhotoEdit] Image processed: ${width}x${height} -> ${aspectRatio}`);
            return aspectRatio;
        } catch (error) {
            console.error('[PhotoEdit] Error calculating aspect ratio:', error);
            return this.policy.defaultAspectRatio;
        }
    }

    /**
     * Replaces whatever photo the conversation held with this one.
     */
    stashPhoto(context: ConversationContext, image: Buffer): StashResult {
        if (!this.isWithinSizeLimit(image)) {
            return { ok: false, reason: 'too_large', sizeMb: image.length / (1024 * 1024) };
        }

        const aspectRatio = this.detectAspectRatio(image);
        context.set('photo', image);
        context.set('aspectRatio', aspectRatio);
        return { ok: true, aspectRatio };
    }

    /**
     * Runs one edit of the stashed photo. Returns null when the job produced
     * no image, whatever the reason; the reason is only logged.
     * The stashed photo is kept so further instructions start from the original.
     */
    async applyInstruction(context: ConversationContext, prompt: string): Promise<Buffer | null> {
        const photo = context.get('photo');
        if (!photo) {
            throw new Error('No photo stashed for this conversation');
        }

        const request = createEditRequest(uuidv4(), {
            image: photo,
            prompt,
            aspectRatio: context.get('aspectRatio') ?? this.policy.defaultAspectRatio,
            outputFormat: this.policy.outputFormat,
            safetyTolerance: this.policy.safetyTolerance,
        });

        try {
            return await this.editClient.editImage(request);
        } catch (error) {
            if (error instanceof ImageEditError) {
                console.error(`[PhotoEdit] Edit ${request.id} produced no image (${error.kind}): ${error.message}`);
                return null;
            }
            throw error;
        }
    }
}
