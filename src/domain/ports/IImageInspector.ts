export interface ImageDimensions {
    width: number;
    height: number;
}

/**
 * IImageInspector - Port for reading pixel dimensions from raw image bytes.
 */
export interface IImageInspector {
    /**
     * @throws Error when the bytes are not a recognizable image
     */
    getDimensions(image: Buffer): ImageDimensions;
}
