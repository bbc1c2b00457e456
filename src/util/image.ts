import { imageSize } from 'image-size';
import * as Logging from '../logging';

export interface ImageInfo {
    width: number;
    height: number;
    /** Format as detected from the file header, e.g. `png` or `jpg`. */
    format: string;
}

/**
 * Reads pixel dimensions and format from the image header.
 * Unknown or truncated data gives `undefined`.
 */
export const readImageInfo = (data: Uint8Array): ImageInfo | undefined => {
    try {
        const { width, height, type } = imageSize(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
        if (width === undefined || height === undefined || type === undefined) {
            return undefined;
        }
        return { width, height, format: type };
    } catch (error) {
        Logging.getLogger().debug('Cannot read image header: %s', error instanceof Error ? error.message : String(error));
        return undefined;
    }
};
