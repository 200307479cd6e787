import sharp from 'sharp';
import { errorMessage, logger } from '../../utils/logger';

export interface ImageDimensions {
  width: number | null;
  height: number | null;
}

/**
 * Read width and height from the image header. Undecodable input yields nulls.
 */
export async function probeDimensions(bytes: Buffer): Promise<ImageDimensions> {
  try {
    const meta = await sharp(bytes).metadata();
    return { width: meta.width ?? null, height: meta.height ?? null };
  } catch (error) {
    logger.debug('Could not read image dimensions', { error: errorMessage(error) });
    return { width: null, height: null };
  }
}
