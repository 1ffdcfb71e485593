export type RuleEffect =
  | { readonly kind: 'percent'; readonly percent: number }
  | { readonly kind: 'amount'; readonly amount: number };

export interface AdjustmentRule<TContext> {
  readonly id: string;
  readonly description: string;
  readonly applies: (ctx: TContext) => boolean;
  readonly effect: RuleEffect;
}

export interface AppliedRule {
  readonly id: string;
  readonly description: string;
  readonly effect: RuleEffect;
  readonly valueBefore: number;
  readonly valueAfter: number;
}
