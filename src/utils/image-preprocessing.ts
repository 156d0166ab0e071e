import sharp from 'sharp';
import { InvalidImageError } from '../helpers/errors';

export const IMAGE_SIZE = 299;
export const IMAGE_CHANNELS = 3;
export const INPUT_SHAPE: [number, number, number] = [IMAGE_SIZE, IMAGE_SIZE, IMAGE_CHANNELS];
export const RESAMPLING_KERNEL = 'cubic';
export const RESAMPLING_FILTER = 'bicubic';

type AcceptedFormat = 'jpeg' | 'png';

export interface RgbImage {
  width: number;
  height: number;
  /** Interleaved 8-bit RGB, row major. */
  data: Buffer;
}

const isAcceptedFormat = (format: string | undefined): format is AcceptedFormat =>
  format === 'jpeg' || format === 'png';

const reason = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Decodes a JPEG or PNG into 8-bit RGB. Alpha is dropped, not composited,
 * and single-channel images are expanded to three channels.
 */
export async function decodeImage(buffer: Buffer): Promise<RgbImage> {
  let format: string | undefined;
  try {
    format = (await sharp(buffer).metadata()).format;
  } catch (err) {
    throw new InvalidImageError(`Invalid image: ${reason(err)}`);
  }

  if (!isAcceptedFormat(format)) {
    throw new InvalidImageError(
      `Invalid image: unsupported format '${format ?? 'unknown'}'. Use JPEG or PNG`
    );
  }

  try {
    const { data, info } = await sharp(buffer)
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      width: info.width,
      height: info.height,
      data: info.channels === IMAGE_CHANNELS ? data : toRgb(data, info.channels),
    };
  } catch (err) {
    throw new InvalidImageError(`Invalid image: ${reason(err)}`);
  }
}

function toRgb(data: Buffer, channels: number): Buffer {
  const pixels = data.length / channels;
  const rgb = Buffer.alloc(pixels * IMAGE_CHANNELS);

  for (let p = 0; p < pixels; p++) {
    for (let c = 0; c < IMAGE_CHANNELS; c++) {
      rgb[p * IMAGE_CHANNELS + c] = data[p * channels + Math.min(c, channels - 1)];
    }
  }
  return rgb;
}

/** Stretches the image to IMAGE_SIZE x IMAGE_SIZE with a bicubic kernel. */
export async function resizeImage(image: RgbImage): Promise<Buffer> {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: IMAGE_CHANNELS },
  })
    .resize(IMAGE_SIZE, IMAGE_SIZE, { fit: 'fill', kernel: RESAMPLING_KERNEL })
    .raw()
    .toBuffer();
}

/** InceptionV3 input scaling: [0, 255] to [-1, 1]. */
export function normalizePixels(pixels: Uint8Array): Float32Array {
  const normalized = new Float32Array(pixels.length);
  for (let i = 0; i < pixels.length; i++) {
    normalized[i] = pixels[i] / 127.5 - 1;
  }
  return normalized;
}

export async function preprocessImage(buffer: Buffer): Promise<Float32Array> {
  const decoded = await decodeImage(buffer);
  const resized = await resizeImage(decoded);
  return normalizePixels(resized);
}
