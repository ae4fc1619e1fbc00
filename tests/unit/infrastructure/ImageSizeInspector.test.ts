import { ImageSizeInspector } from '../../../src/infrastructure/images/ImageSizeInspector';

/** Minimal PNG signature plus IHDR chunk header, enough for dimension sniffing. */
function pngHeader(width: number, height: number): Buffer {
    const buffer = Buffer.alloc(24);
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(buffer, 0);
    buffer.writeUInt32BE(13, 8);
    buffer.write('IHDR', 12, 'ascii');
    buffer.writeUInt32BE(width, 16);
    buffer.writeUInt32BE(height, 20);
    return buffer;
}

describe('ImageSizeInspector', () => {
    const inspector = new ImageSizeInspector();

    it('should read dimensions from a PNG header', () => {
        expect(inspector.getDimensions(pngHeader(1920, 1080))).toEqual({ width: 1920, height: 1080 });
    });

    it('should throw for bytes that are not an image', () => {
        expect(() => inspector.getDimensions(Buffer.from('definitely not an image'))).toThrow();
    });

    it('should throw when a dimension is zero', () => {
        expect(() => inspector.getDimensions(pngHeader(0, 480)))
            .toThrow('Could not read dimensions from png image');
    });
});
