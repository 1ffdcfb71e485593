import type { AdjustmentRule, BodyType } from '@valuation/domain';
import type { ValuationContext } from './context.js';
import { percent } from './rules.js';

export interface DealerTerms {
  marginPercent: number;
  refurbCost: number;
}

export const DEALER_TERMS: Readonly<Record<BodyType, DealerTerms>> = {
  Hatchback: { marginPercent: 10, refurbCost: 8_000 },
  Sedan: { marginPercent: 12, refurbCost: 15_000 },
  SUV: { marginPercent: 12, refurbCost: 15_000 },
  Luxury: { marginPercent: 15, refurbCost: 25_000 },
};

/** Applied to book value, ahead of market convergence. */
export const OWNER_RULES: readonly AdjustmentRule<ValuationContext>[] = [
  {
    id: 'second-owner',
    description: 'Second owner',
    applies: ({ record }) => record.ownerCount === 2,
    effect: percent(-4),
  },
  {
    id: 'third-owner',
    description: 'Third owner',
    applies: ({ record }) => record.ownerCount === 3,
    effect: percent(-8),
  },
  {
    id: 'fourth-owner-or-more',
    description: 'Fourth or later owner',
    applies: ({ record }) => record.ownerCount >= 4,
    effect: percent(-12),
  },
];

export function dealerPurchasePrice(
  fairMarketRetailValue: number,
  bodyType: BodyType,
): { price: number; terms: DealerTerms } {
  const terms = DEALER_TERMS[bodyType];
  const price = fairMarketRetailValue * (1 - terms.marginPercent / 100) - terms.refurbCost;
  return { price: Math.max(0, price), terms };
}
