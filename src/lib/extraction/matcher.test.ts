import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { matchQuartersWithValues, partitionDetections } from './matcher';
import type { BoxRect, TextDetection } from './types';

function rect(x0: number, y0: number, width = 20, height = 10): BoxRect {
  return { x0, y0, x1: x0 + width, y1: y0 + height };
}

function det(text: string, box: BoxRect): TextDetection {
  return { text, box, confidence: 0.9 };
}

function match(detections: TextDetection[], imageHeight = 1000) {
  const { labels, numbers } = partitionDetections(detections, imageHeight);
  return matchQuartersWithValues(labels, numbers);
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

describe('partitionDetections', () => {
  it('only reads labels from the bottom band', () => {
    const { labels, numbers } = partitionDetections(
      [det("Q1'14", rect(100, 900)), det("Q2'14", rect(200, 100)), det('1.25', rect(100, 400))],
      1000
    );

    expect(labels.map((l) => l.sourceText)).toEqual(["Q1'14"]);
    expect(numbers.map((n) => n.value)).toEqual([1.25]);
  });

  it('does not reuse a label as a number', () => {
    const { labels, numbers } = partitionDetections([det('0114', rect(100, 900))], 1000);
    expect(labels).toHaveLength(1);
    expect(numbers).toHaveLength(0);
  });

  it('drops year-like numbers', () => {
    const { numbers } = partitionDetections([det('2016', rect(100, 400)), det('27.85', rect(105, 450))], 1000);
    expect(numbers.map((n) => n.value)).toEqual([27.85]);
  });
});

describe('matchQuartersWithValues', () => {
  it('pairs labels left to right whatever the detection order', () => {
    const pairs = match([
      det("Q3'14", rect(300, 900)),
      det('3.3', rect(300, 500)),
      det("Q1'14", rect(100, 900)),
      det('1.1', rect(100, 300)),
      det("Q4'14", rect(400, 900)),
      det('4.4', rect(400, 600)),
      det("Q2'14", rect(200, 900)),
      det('2.2', rect(200, 400)),
    ]);

    expect(pairs.map((p) => [p.quarter, p.year, p.value])).toEqual([
      [1, 2014, 1.1],
      [2, 2014, 2.2],
      [3, 2014, 3.3],
      [4, 2014, 4.4],
    ]);
  });

  it('records offsets and the weighted distance', () => {
    const [pair] = match([det("Q1'14", rect(100, 900)), det('27.85', rect(102, 500))]);

    expect(pair?.xDiff).toBe(2);
    expect(pair?.yDiff).toBe(400);
    expect(pair?.distance).toBeCloseTo(Math.sqrt(2000), 9);
    expect(pair?.labelBox).toEqual(rect(100, 900));
    expect(pair?.valueBox).toEqual(rect(102, 500));
  });

  it('never pairs a year with a label', () => {
    const pairs = match([det("Q1'14", rect(100, 900)), det('2016', rect(100, 800)), det('27.85', rect(105, 400))]);
    expect(pairs.map((p) => p.value)).toEqual([27.85]);
  });

  it('ignores values below the label', () => {
    expect(match([det("Q1'14", rect(100, 800)), det('1.5', rect(100, 900))])).toEqual([]);
  });

  it('drops labels with no value within the horizontal tolerance', () => {
    const pairs = match([det("Q1'14", rect(100, 900)), det('1.5', rect(111, 400))]);
    expect(pairs).toEqual([]);
    expect(console.log).toHaveBeenCalledWith('[Matcher] No value found for "Q1\'14"');
  });

  it('does not hand a claimed value to a later label', () => {
    const pairs = match([
      det("Q1'14", rect(100, 900)),
      det("Q2'14", rect(108, 900)),
      det('1.5', rect(104, 400)),
    ]);

    expect(pairs).toHaveLength(1);
    expect(pairs[0]?.quarter).toBe(1);
  });

  it('prefers the closer column even when the other value is nearer vertically', () => {
    const pairs = match([det("Q1'14", rect(100, 900)), det('9.9', rect(108, 850)), det('1.5', rect(100, 300))]);
    // (10*8)^2 + (0.1*50)^2 = 6425 against (0.1*600)^2 = 3600
    expect(pairs[0]?.value).toBe(1.5);
  });

  it('breaks equal distances on the smaller horizontal offset', () => {
    // Both at distance 50: (10*3, 0.1*400) and (10*0, 0.1*500)
    const pairs = match([det("Q1'14", rect(100, 900)), det('7.7', rect(103, 500)), det('5.5', rect(100, 400))]);
    expect(pairs[0]?.value).toBe(5.5);
    expect(pairs[0]?.distance).toBe(50);
  });
});
