import type { AdjustmentRule, AppliedRule, RuleEffect } from '@valuation/domain';

export interface RuleChainResult {
  value: number;
  /** Product of the multiplicative effects that fired; 1 when none did. */
  factor: number;
  applied: AppliedRule[];
}

function applyEffect(value: number, effect: RuleEffect): number {
  return effect.kind === 'percent' ? value * (1 + effect.percent / 100) : value + effect.amount;
}

/**
 * Evaluates every rule against the same context, in list order. Each rule that
 * applies acts on the running value left by the previous one.
 */
export function applyRules<TContext>(
  initialValue: number,
  rules: readonly AdjustmentRule<TContext>[],
  ctx: TContext,
): RuleChainResult {
  let value = initialValue;
  let factor = 1;
  const applied: AppliedRule[] = [];

  for (const rule of rules) {
    if (!rule.applies(ctx)) continue;
    const valueAfter = applyEffect(value, rule.effect);
    if (rule.effect.kind === 'percent') factor *= 1 + rule.effect.percent / 100;
    applied.push({
      id: rule.id,
      description: rule.description,
      effect: rule.effect,
      valueBefore: value,
      valueAfter,
    });
    value = valueAfter;
  }

  return { value, factor, applied };
}

export function percent(p: number): RuleEffect {
  return { kind: 'percent', percent: p };
}
