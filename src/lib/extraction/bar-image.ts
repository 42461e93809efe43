/**
 * Chart image decoding with Sharp.
 *
 * The classifier works on 8-bit grayscale pixels, so images are flattened
 * onto white (dropping alpha), converted to grayscale and read back raw.
 */

import sharp from 'sharp';
import { ChartImageError } from './errors';
import type { GrayImage } from './types';

export async function decodeChartImage(buffer: Buffer, label = 'image'): Promise<GrayImage> {
  let raw: { data: Buffer; info: sharp.OutputInfo };
  try {
    raw = await sharp(buffer)
      .flatten({ background: '#ffffff' })
      .grayscale()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ChartImageError(`Cannot read ${label}: ${reason}`, { cause: error });
  }

  const { width, height, channels } = raw.info;
  if (width === 0 || height === 0) {
    throw new ChartImageError(`Cannot read ${label}: empty image`);
  }

  if (channels === 1) {
    return { width, height, data: new Uint8Array(raw.data) };
  }

  // Keep the first channel when libvips hands back more than one
  const data = new Uint8Array(width * height);
  for (let i = 0; i < data.length; i++) {
    data[i] = raw.data[i * channels] ?? 0;
  }
  return { width, height, data };
}

/**
 * Encode grayscale pixels as PNG. Used for debug crops and test fixtures.
 */
export async function encodeGrayPng(image: GrayImage): Promise<Buffer> {
  return sharp(Buffer.from(image.data), {
    raw: { width: image.width, height: image.height, channels: 1 },
  })
    .png()
    .toBuffer();
}
