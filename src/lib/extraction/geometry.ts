import type { BoxRect } from './types';

export function centerX(box: BoxRect): number {
  return (box.x0 + box.x1) / 2;
}

export function centerY(box: BoxRect): number {
  return (box.y0 + box.y1) / 2;
}

/**
 * Rectangle between a value (above) and its label (below): spans both boxes
 * horizontally, runs from the bottom of the value to the top of the label.
 * Clamped to the image; an inverted or empty span collapses to zero area.
 */
export function barRegion(
  labelBox: BoxRect,
  valueBox: BoxRect,
  imageWidth: number,
  imageHeight: number
): BoxRect {
  const x0 = clamp(Math.floor(Math.min(labelBox.x0, valueBox.x0)), 0, imageWidth);
  const x1 = clamp(Math.ceil(Math.max(labelBox.x1, valueBox.x1)), 0, imageWidth);
  const y0 = clamp(Math.ceil(valueBox.y1), 0, imageHeight);
  const y1 = clamp(Math.floor(labelBox.y0), 0, imageHeight);

  return {
    x0,
    y0,
    x1: Math.max(x0, x1),
    y1: Math.max(y0, y1),
  };
}

export function scaleBox(box: BoxRect, factor: number): BoxRect {
  return {
    x0: box.x0 * factor,
    y0: box.y0 * factor,
    x1: box.x1 * factor,
    y1: box.y1 * factor,
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
