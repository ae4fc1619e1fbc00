import { imageSize } from 'image-size';
import { IImageInspector, ImageDimensions } from '../../domain/ports/IImageInspector';

/**
 * Reads width/height from the image header without decoding pixels.
 */
export class ImageSizeInspector implements IImageInspector {
    getDimensions(image: Buffer): ImageDimensions {
        const { width, height, type } = imageSize(image);
        if (!width || !height) {
            throw new Error(`Could not read dimensions from ${type ?? 'unknown'} image`);
        }
        return { width, height };
    }
}
