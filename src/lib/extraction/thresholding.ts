/**
 * Binarization primitives over 8-bit grayscale buffers. Outputs are masks of
 * 0 / 255 with the same dimensions as the input.
 */

import type { BoxRect, GrayImage } from './types';

export const WHITE = 255;
export const BLACK = 0;

export function cropGray(image: GrayImage, region: BoxRect): GrayImage {
  const width = Math.max(0, region.x1 - region.x0);
  const height = Math.max(0, region.y1 - region.y0);
  const data = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    const sourceStart = (region.y0 + y) * image.width + region.x0;
    data.set(image.data.subarray(sourceStart, sourceStart + width), y * width);
  }

  return { width, height, data };
}

/**
 * Otsu's threshold: the intensity that maximizes between-class variance,
 * where the lower class is `pixel <= t`. A single-intensity image returns
 * that intensity; an empty one returns 0.
 */
export function otsuThreshold(data: Uint8Array): number {
  if (data.length === 0) return 0;

  const histogram = new Array<number>(256).fill(0);
  let weightedSum = 0;
  for (const value of data) {
    histogram[value] = (histogram[value] ?? 0) + 1;
    weightedSum += value;
  }

  const total = data.length;
  let backgroundWeight = 0;
  let backgroundSum = 0;
  let bestVariance = 0;
  let threshold: number | null = null;

  for (let t = 0; t < 256; t++) {
    const count = histogram[t] ?? 0;
    backgroundWeight += count;
    if (backgroundWeight === 0) continue;

    const foregroundWeight = total - backgroundWeight;
    if (foregroundWeight === 0) break;

    backgroundSum += t * count;
    const backgroundMean = backgroundSum / backgroundWeight;
    const foregroundMean = (weightedSum - backgroundSum) / foregroundWeight;
    const variance = backgroundWeight * foregroundWeight * (backgroundMean - foregroundMean) ** 2;

    if (variance > bestVariance) {
      bestVariance = variance;
      threshold = t;
    }
  }

  return threshold ?? (data[0] ?? 0);
}

export function binarize(image: GrayImage, threshold: number, inverted = false): Uint8Array {
  const mask = new Uint8Array(image.data.length);
  for (let i = 0; i < image.data.length; i++) {
    const above = (image.data[i] ?? 0) > threshold;
    mask[i] = above !== inverted ? WHITE : BLACK;
  }
  return mask;
}

export function gaussianKernel(size: number): number[] {
  // Same sigma rule OpenCV derives from the kernel size
  const sigma = 0.3 * ((size - 1) * 0.5 - 1) + 0.8;
  const half = Math.floor(size / 2);
  const weights: number[] = [];
  let sum = 0;

  for (let i = -half; i <= half; i++) {
    const w = Math.exp(-(i * i) / (2 * sigma * sigma));
    weights.push(w);
    sum += w;
  }

  return weights.map((w) => w / sum);
}

/**
 * Separable Gaussian blur with replicated borders.
 */
export function gaussianBlur(image: GrayImage, size: number): Float64Array {
  const { width, height, data } = image;
  const kernel = gaussianKernel(size);
  const half = Math.floor(size / 2);
  const horizontal = new Float64Array(width * height);
  const output = new Float64Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = -half; k <= half; k++) {
        const sx = Math.min(width - 1, Math.max(0, x + k));
        acc += (kernel[k + half] ?? 0) * (data[y * width + sx] ?? 0);
      }
      horizontal[y * width + x] = acc;
    }
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = -half; k <= half; k++) {
        const sy = Math.min(height - 1, Math.max(0, y + k));
        acc += (kernel[k + half] ?? 0) * (horizontal[sy * width + x] ?? 0);
      }
      output[y * width + x] = acc;
    }
  }

  return output;
}

/**
 * Gaussian adaptive threshold: white where `pixel > localMean - c`.
 */
export function adaptiveThreshold(image: GrayImage, blockSize = 11, c = 2): Uint8Array {
  const mean = gaussianBlur(image, blockSize);
  const mask = new Uint8Array(image.data.length);

  for (let i = 0; i < image.data.length; i++) {
    mask[i] = (image.data[i] ?? 0) > (mean[i] ?? 0) - c ? WHITE : BLACK;
  }

  return mask;
}

function morph(
  mask: Uint8Array,
  width: number,
  height: number,
  size: number,
  pick: (a: number, b: number) => number
): Uint8Array {
  const half = Math.floor(size / 2);
  const output = new Uint8Array(mask.length);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let value = mask[y * width + x] ?? BLACK;
      for (let dy = -half; dy <= half; dy++) {
        const sy = y + dy;
        if (sy < 0 || sy >= height) continue;
        for (let dx = -half; dx <= half; dx++) {
          const sx = x + dx;
          if (sx < 0 || sx >= width) continue;
          value = pick(value, mask[sy * width + sx] ?? BLACK);
        }
      }
      output[y * width + x] = value;
    }
  }

  return output;
}

export function dilate(mask: Uint8Array, width: number, height: number, size: number): Uint8Array {
  return morph(mask, width, height, size, Math.max);
}

export function erode(mask: Uint8Array, width: number, height: number, size: number): Uint8Array {
  return morph(mask, width, height, size, Math.min);
}

/** Dilate then erode: fills gaps narrower than the kernel */
export function morphologicalClose(
  mask: Uint8Array,
  width: number,
  height: number,
  size = 5
): Uint8Array {
  return erode(dilate(mask, width, height, size), width, height, size);
}

export function whiteRatio(mask: Uint8Array): number {
  if (mask.length === 0) return 0;
  let white = 0;
  for (const value of mask) {
    if (value === WHITE) white++;
  }
  return white / mask.length;
}
