import { EditRequest } from '../entities/EditRequest';

/**
 * IImageEditClient - Port for instruction-based image editing services.
 * Implementations: FluxKontextEditClient
 */
export interface IImageEditClient {
    /**
     * Runs one edit job to completion.
     * @returns The edited image bytes
     * @throws ImageEditError subclass describing why no image was produced
     */
    editImage(request: EditRequest): Promise<Buffer>;
}
