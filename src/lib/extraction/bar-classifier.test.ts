import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { classifyBarRegion, classifyPair, tallyVotes, tierFor, voteFor } from './bar-classifier';
import type { BarVote, GrayImage, QuarterValuePair } from './types';

function image(width: number, height: number, pixel: (x: number, y: number) => number): GrayImage {
  const data = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) data[y * width + x] = pixel(x, y);
  }
  return { width, height, data };
}

/** Solid fill, as printed for reported quarters */
const solidBar = image(20, 30, () => 40);
/** Alternating light columns, as printed for estimated quarters */
const hatchedBar = image(20, 30, (x) => (x % 2 === 0 ? 255 : 200));

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

describe('voteFor', () => {
  it('reads a high adaptive ratio as dark', () => {
    expect(voteFor('AdaptiveThreshold', 0.8)).toBe('dark');
    expect(voteFor('AdaptiveThreshold', 0.7)).toBe('light');
  });

  it('reads closing ratios the other way round', () => {
    expect(voteFor('MorphologicalClosing', 0.05)).toBe('dark');
    expect(voteFor('MorphologicalClosing', 0.95)).toBe('light');
  });

  it('reads a high inverted Otsu ratio as dark', () => {
    expect(voteFor('InvertedOtsu', 0.71)).toBe('dark');
    expect(voteFor('InvertedOtsu', 0.3)).toBe('light');
  });
});

describe('tallyVotes', () => {
  const vote = (method: BarVote['method'], cls: BarVote['vote']): BarVote => ({
    method,
    whiteRatio: 0,
    vote: cls,
  });

  it('takes the majority with a 67 tier on a split vote', () => {
    const result = tallyVotes([
      vote('AdaptiveThreshold', 'dark'),
      vote('MorphologicalClosing', 'light'),
      vote('InvertedOtsu', 'dark'),
    ]);
    expect(result.finalClass).toBe('dark');
    expect(result.agreementCount).toBe(2);
    expect(result.tierConfidence).toBe(67);
  });

  it('gives 100 to a unanimous vote', () => {
    const result = tallyVotes([
      vote('AdaptiveThreshold', 'light'),
      vote('MorphologicalClosing', 'light'),
      vote('InvertedOtsu', 'light'),
    ]);
    expect(result.finalClass).toBe('light');
    expect(result.tierConfidence).toBe(100);
  });

  it('resolves a tie to light', () => {
    const result = tallyVotes([vote('AdaptiveThreshold', 'dark'), vote('InvertedOtsu', 'light')]);
    expect(result.finalClass).toBe('light');
    expect(result.agreementCount).toBe(1);
    expect(result.tierConfidence).toBe(33);
  });

  it('maps agreement counts to tiers', () => {
    expect([tierFor(3), tierFor(2), tierFor(1), tierFor(0)]).toEqual([100, 67, 33, 33]);
  });
});

describe('classifyBarRegion', () => {
  it('classifies a solid bar as dark unanimously', () => {
    const result = classifyBarRegion(solidBar);
    expect(result.votes.map((v) => [v.method, v.whiteRatio, v.vote])).toEqual([
      ['AdaptiveThreshold', 1, 'dark'],
      ['MorphologicalClosing', 0, 'dark'],
      ['InvertedOtsu', 1, 'dark'],
    ]);
    expect(result.finalClass).toBe('dark');
    expect(result.tierConfidence).toBe(100);
  });

  it('classifies a hatched bar as light unanimously', () => {
    const result = classifyBarRegion(hatchedBar);
    expect(result.votes.map((v) => [v.method, v.whiteRatio, v.vote])).toEqual([
      ['AdaptiveThreshold', 0.5, 'light'],
      ['MorphologicalClosing', 1, 'light'],
      ['InvertedOtsu', 0.5, 'light'],
    ]);
    expect(result.finalClass).toBe('light');
    expect(result.tierConfidence).toBe(100);
  });

  it('still returns a result for an empty region', () => {
    const result = classifyBarRegion({ width: 0, height: 0, data: new Uint8Array(0) });
    expect(result.votes.map((v) => v.whiteRatio)).toEqual([0, 0, 0]);
    expect(result.finalClass).toBe('light');
    expect(result.tierConfidence).toBe(67);
  });
});

describe('classifyPair', () => {
  const chart = image(100, 100, (x, y) => (x >= 40 && x < 60 && y >= 15 && y < 85 ? 40 : 255));

  const pair: QuarterValuePair = {
    quarter: 1,
    year: 2014,
    value: 1.5,
    labelBox: { x0: 45, y0: 85, x1: 55, y1: 95 },
    valueBox: { x0: 44, y0: 5, x1: 56, y1: 15 },
    xDiff: 0,
    yDiff: 80,
    distance: 8,
  };

  it('classifies the area between value and label', () => {
    const result = classifyPair(chart, pair);
    expect(result.finalClass).toBe('dark');
    expect(result.tierConfidence).toBe(100);
    expect(console.log).not.toHaveBeenCalled();
  });

  it('logs split votes', () => {
    const collapsed = { ...pair, valueBox: { x0: 44, y0: 85, x1: 56, y1: 90 } };
    const result = classifyPair(chart, collapsed);
    expect(result.tierConfidence).toBe(67);
    expect(console.log).toHaveBeenCalledWith(
      "[Classifier] Q1'14 split vote: AdaptiveThreshold=light(0.00), MorphologicalClosing=dark(0.00), InvertedOtsu=light(0.00)"
    );
  });
});
