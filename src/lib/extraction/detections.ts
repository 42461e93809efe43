/**
 * Sidecar detections files: the OCR output for `<name>.png` is stored as
 * `<name>.json`, either as a bare array of detections or wrapped with the
 * source image height.
 */

import { z } from 'zod';
import { DetectionsFormatError } from './errors';
import type { TextDetection } from './types';

const boxSchema = z
  .object({
    x0: z.number().finite(),
    y0: z.number().finite(),
    x1: z.number().finite(),
    y1: z.number().finite(),
  })
  .refine((b) => b.x1 >= b.x0 && b.y1 >= b.y0, { message: 'Box corners are inverted' });

export const textDetectionSchema = z.object({
  text: z.string(),
  box: boxSchema,
  confidence: z.number().min(0).max(1).default(1),
});

export const detectionsFileSchema = z.preprocess(
  (raw) => (Array.isArray(raw) ? { detections: raw } : raw),
  z.object({
    imageHeight: z.number().int().positive().optional(),
    detections: z.array(textDetectionSchema),
  })
);

export interface DetectionsFile {
  imageHeight?: number;
  detections: TextDetection[];
}

export function parseDetectionsFile(raw: unknown, source = 'detections'): DetectionsFile {
  const result = detectionsFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new DetectionsFormatError(`Invalid ${source}`, issues);
  }

  const { imageHeight, detections } = result.data;
  return imageHeight === undefined ? { detections } : { imageHeight, detections };
}

export function parseDetectionsJson(json: string, source = 'detections'): DetectionsFile {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DetectionsFormatError(`Invalid ${source}`, [`not JSON (${reason})`]);
  }
  return parseDetectionsFile(raw, source);
}
