/**
 * Image Processing Service
 *
 * Face crops for recognition events and unknown faces.
 * Uses Sharp for decoding, cropping and JPEG encoding.
 */

import sharp from 'sharp';
import { BoundingBox } from '../types/face.js';

export interface CropRegion {
    left: number;
    top: number;
    width: number;
    height: number;
}

/**
 * Clamp a detector box to the image and convert it to a sharp extract region.
 * Returns null when nothing of the box lies inside the image.
 */
export function toCropRegion(box: BoundingBox, width: number, height: number): CropRegion | null {
    const left = Math.max(0, Math.floor(box.left));
    const top = Math.max(0, Math.floor(box.top));
    const right = Math.min(width, Math.ceil(box.right));
    const bottom = Math.min(height, Math.ceil(box.bottom));

    if (right <= left || bottom <= top) {
        return null;
    }
    return { left, top, width: right - left, height: bottom - top };
}

export class ImageService {
    private readonly CROP_QUALITY = 95;

    /**
     * Cut one face out of an image as JPEG.
     * @throws when the image cannot be decoded or the box lies outside it
     */
    async cropFace(buffer: Buffer, box: BoundingBox): Promise<Buffer> {
        const { width, height } = await this.getMetadata(buffer);
        const region = toCropRegion(box, width, height);

        if (!region) {
            throw new RangeError(
                `Face box (${box.top},${box.right},${box.bottom},${box.left}) is outside the ${width}x${height} image`
            );
        }

        return sharp(buffer)
            .extract(region)
            .jpeg({ quality: this.CROP_QUALITY })
            .toBuffer();
    }

    /**
     * Get image metadata without processing
     */
    async getMetadata(buffer: Buffer): Promise<{
        width: number;
        height: number;
        format: string;
    }> {
        const metadata = await sharp(buffer).metadata();
        return {
            width: metadata.width || 0,
            height: metadata.height || 0,
            format: metadata.format || 'unknown',
        };
    }
}

// Singleton instance
export const imageService = new ImageService();
