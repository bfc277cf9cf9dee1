import sharp from 'sharp';

/** Mask pixels above this value are foreground */
export const MASK_THRESHOLD = 127;

/**
 * Single-channel raster of fixed size
 */
export interface GrayRaster {
  data: Uint8Array;
  width: number;
  height: number;
}

/**
 * Load an image as an 8-bit grayscale raster stretched to width x height
 */
export async function loadGrayRaster(imagePath: string, width: number, height: number): Promise<GrayRaster> {
  const { data, info } = await sharp(imagePath)
    .removeAlpha()
    .greyscale()
    .resize(width, height, { fit: 'fill' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { data: firstChannel(data, info.channels, width * height), width, height };
}

/**
 * Load a mask as a foreground flag per pixel, resized to width x height
 */
export async function loadMask(maskPath: string, width: number, height: number): Promise<boolean[]> {
  const { data } = await loadGrayRaster(maskPath, width, height);
  return Array.from(data, (value) => value > MASK_THRESHOLD);
}

function firstChannel(data: Buffer, channels: number, pixels: number): Uint8Array {
  if (channels === 1) {
    return new Uint8Array(data.buffer, data.byteOffset, pixels);
  }
  const out = new Uint8Array(pixels);
  for (let i = 0; i < pixels; i++) {
    out[i] = data[i * channels];
  }
  return out;
}

/**
 * Scale a vector to unit length; a zero vector is returned unchanged
 */
export function l2Normalize(values: number[]): number[] {
  let sumSq = 0;
  for (const value of values) {
    sumSq += value * value;
  }
  if (sumSq === 0) {
    return values;
  }
  const norm = Math.sqrt(sumSq);
  return values.map((value) => value / norm);
}
