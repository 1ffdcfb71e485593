import type { ValidationStatus } from '@valuation/domain';
import { round2 } from './money.js';

export const REVIEW_THRESHOLD_PERCENT = 20;
export const BASE_CONFIDENCE = 85;
export const NO_MARKET_DATA_CONFIDENCE = 75;
export const REVIEW_CONFIDENCE_PENALTY = 20;

export interface IdvValidation {
  validationStatus: ValidationStatus;
  differencePercent: number | null;
  confidenceScore: number;
}

function clampScore(score: number): number {
  return Math.min(100, Math.max(0, score));
}

/**
 * Compares an IDV with the market median. A breach is a normal outcome that
 * routes the case to manual review; it is never thrown.
 */
export function validateIdv(calculatedIdv: number, marketMedianEstimate?: number | null): IdvValidation {
  if (marketMedianEstimate === undefined || marketMedianEstimate === null || marketMedianEstimate <= 0) {
    return {
      validationStatus: 'No Market Data',
      differencePercent: null,
      confidenceScore: clampScore(NO_MARKET_DATA_CONFIDENCE),
    };
  }

  const difference = (Math.abs(calculatedIdv - marketMedianEstimate) / marketMedianEstimate) * 100;
  const needsReview = difference > REVIEW_THRESHOLD_PERCENT;
  return {
    validationStatus: needsReview ? 'Manual Review Required' : 'Within Acceptable Range',
    differencePercent: round2(difference),
    confidenceScore: clampScore(BASE_CONFIDENCE - (needsReview ? REVIEW_CONFIDENCE_PENALTY : 0)),
  };
}
