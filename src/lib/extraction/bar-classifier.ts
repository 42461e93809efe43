/**
 * Ensemble classification of a bar as filled ("dark", an actual value) or
 * partially filled ("light", an estimate).
 *
 * Adaptive threshold and inverted Otsu favour sharply bounded solid bars,
 * closing favours gapped partial bars; the majority of the three decides.
 */

import { barRegion } from './geometry';
import { formatQuarterKey } from './quarter-label';
import {
  adaptiveThreshold,
  binarize,
  cropGray,
  morphologicalClose,
  otsuThreshold,
  whiteRatio,
} from './thresholding';
import type {
  BarClass,
  BarVote,
  ClassificationMethod,
  ClassificationResult,
  GrayImage,
  QuarterValuePair,
  TierConfidence,
} from './types';

export interface MethodRule {
  method: ClassificationMethod;
  ratioThreshold: number;
  /** Class voted when the white ratio is above the threshold */
  whiteAbove: BarClass;
}

export const METHOD_RULES = {
  AdaptiveThreshold: { method: 'AdaptiveThreshold', ratioThreshold: 0.7, whiteAbove: 'dark' },
  MorphologicalClosing: { method: 'MorphologicalClosing', ratioThreshold: 0.5, whiteAbove: 'light' },
  InvertedOtsu: { method: 'InvertedOtsu', ratioThreshold: 0.7, whiteAbove: 'dark' },
} as const satisfies Record<ClassificationMethod, MethodRule>;

export const CLASSIFICATION_METHODS: readonly ClassificationMethod[] = [
  'AdaptiveThreshold',
  'MorphologicalClosing',
  'InvertedOtsu',
];

function opposite(cls: BarClass): BarClass {
  return cls === 'dark' ? 'light' : 'dark';
}

export function voteFor(method: ClassificationMethod, ratio: number): BarClass {
  const rule: MethodRule = METHOD_RULES[method];
  return ratio > rule.ratioThreshold ? rule.whiteAbove : opposite(rule.whiteAbove);
}

export function binarizeFor(method: ClassificationMethod, region: GrayImage): Uint8Array {
  switch (method) {
    case 'AdaptiveThreshold':
      return adaptiveThreshold(region, 11, 2);
    case 'MorphologicalClosing': {
      const mask = binarize(region, otsuThreshold(region.data));
      return morphologicalClose(mask, region.width, region.height, 5);
    }
    case 'InvertedOtsu':
      return binarize(region, otsuThreshold(region.data), true);
  }
}

export function tierFor(agreementCount: number): TierConfidence {
  if (agreementCount >= 3) return 100;
  if (agreementCount === 2) return 67;
  return 33;
}

/**
 * Majority vote. A tie (only possible when a method abstained) resolves to
 * light, i.e. the value is treated as an estimate.
 */
export function tallyVotes(votes: BarVote[]): ClassificationResult {
  const dark = votes.filter((v) => v.vote === 'dark').length;
  const light = votes.length - dark;
  const finalClass: BarClass = dark > light ? 'dark' : 'light';
  const agreementCount = Math.max(dark, light);

  return {
    votes,
    agreementCount,
    finalClass,
    tierConfidence: tierFor(agreementCount),
  };
}

export function classifyBarRegion(region: GrayImage): ClassificationResult {
  const votes = CLASSIFICATION_METHODS.map((method): BarVote => {
    const ratio = whiteRatio(binarizeFor(method, region));
    return { method, whiteRatio: ratio, vote: voteFor(method, ratio) };
  });

  return tallyVotes(votes);
}

export function cropBarRegion(image: GrayImage, pair: QuarterValuePair): GrayImage {
  const region = barRegion(pair.labelBox, pair.valueBox, image.width, image.height);
  return cropGray(image, region);
}

export function classifyPair(image: GrayImage, pair: QuarterValuePair): ClassificationResult {
  const result = classifyBarRegion(cropBarRegion(image, pair));

  if (result.tierConfidence < 100) {
    const detail = result.votes.map((v) => `${v.method}=${v.vote}(${v.whiteRatio.toFixed(2)})`).join(', ');
    console.log(`[Classifier] ${formatQuarterKey(pair.quarter, pair.year)} split vote: ${detail}`);
  }

  return result;
}
