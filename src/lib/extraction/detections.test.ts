import { describe, it, expect } from '@jest/globals';
import { DetectionsFormatError } from './errors';
import { parseDetectionsFile, parseDetectionsJson } from './detections';

const box = { x0: 1, y0: 2, x1: 3, y1: 4 };

describe('parseDetectionsFile', () => {
  it('accepts a bare array of detections', () => {
    expect(parseDetectionsFile([{ text: "Q1'14", box, confidence: 0.5 }])).toEqual({
      detections: [{ text: "Q1'14", box, confidence: 0.5 }],
    });
  });

  it('accepts the wrapped form with an image height', () => {
    expect(parseDetectionsFile({ imageHeight: 800, detections: [{ text: '1.5', box }] })).toEqual({
      imageHeight: 800,
      detections: [{ text: '1.5', box, confidence: 1 }],
    });
  });

  it('reports where a detection is malformed', () => {
    const bad = [{ text: 'ok', box }, { text: 'bad', box: { x0: 5, y0: 0, x1: 1, y1: 1 } }];
    expect(() => parseDetectionsFile(bad, '20161209-6.json')).toThrow(
      'Invalid 20161209-6.json: detections.1.box: Box corners are inverted'
    );
  });

  it('rejects confidences outside [0, 1]', () => {
    let caught: unknown;
    try {
      parseDetectionsFile([{ text: 'x', box, confidence: 1.5 }]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DetectionsFormatError);
    expect(caught instanceof DetectionsFormatError ? caught.issues : []).toHaveLength(1);
  });
});

describe('parseDetectionsJson', () => {
  it('parses JSON text', () => {
    expect(parseDetectionsJson(JSON.stringify([{ text: 'a', box }])).detections).toHaveLength(1);
  });

  it('reports invalid JSON as a format error', () => {
    expect(() => parseDetectionsJson('{', 'broken.json')).toThrow(DetectionsFormatError);
    expect(() => parseDetectionsJson('{', 'broken.json')).toThrow(/^Invalid broken\.json: not JSON/);
  });
});
