import type { AdjustmentRule, VehicleRecord } from '@valuation/domain';
import type { ValuationContext } from './context.js';
import { percent } from './rules.js';

export const DISCONTINUED_MODELS: ReadonlySet<string> = new Set([
  'ECOSPORT',
  'FIGO',
  'ASPIRE',
  'CIVIC',
  'CR-V',
  'YARIS',
  'ETIOS',
  'COROLLA',
  'PUNTO',
  'LINEA',
  'AVEO',
  'BEAT',
  'SAIL',
]);

export const NEW_GENERATION_MODELS: ReadonlySet<string> = new Set([
  'SWIFT',
  'DZIRE',
  'BALENO',
  'CRETA',
  'VENUE',
  'I20',
  'VERNA',
  'SELTOS',
  'SONET',
  'CITY',
  'AMAZE',
  'WR-V',
  'BREZZA',
  'ERTIGA',
]);

export const PREFERRED_COLORS: ReadonlySet<string> = new Set(['WHITE', 'SILVER', 'GREY', 'GRAY', 'BLACK']);

// A catalog generation is "old" once the vehicle is past this age.
export const OLD_GENERATION_AFTER_MONTHS = 36;

function modelMatches(record: VehicleRecord, catalog: ReadonlySet<string>): boolean {
  return record.fullModel.split(' ').some((token) => catalog.has(token));
}

export function isDiscontinued(ctx: ValuationContext): boolean {
  return ctx.lifecycle.discontinued ?? modelMatches(ctx.record, DISCONTINUED_MODELS);
}

export function hasNewerGeneration(ctx: ValuationContext): boolean {
  if (ctx.lifecycle.newGenerationLaunched !== undefined) return ctx.lifecycle.newGenerationLaunched;
  return (
    modelMatches(ctx.record, NEW_GENERATION_MODELS) &&
    ctx.age.totalMonths > OLD_GENERATION_AFTER_MONTHS
  );
}

/** Unknown colour carries no penalty. */
export function hasNonPreferredColor(ctx: ValuationContext): boolean {
  const color = ctx.record.color?.trim().toUpperCase();
  return !!color && !PREFERRED_COLORS.has(color);
}

export const MARKET_INTELLIGENCE_RULES: readonly AdjustmentRule<ValuationContext>[] = [
  {
    id: 'discontinued-model',
    description: 'Model discontinued',
    applies: isDiscontinued,
    effect: percent(-15),
  },
  {
    id: 'new-generation-launched',
    description: 'Newer generation of the model on sale',
    applies: hasNewerGeneration,
    effect: percent(-10),
  },
  {
    id: 'non-preferred-color',
    description: 'Colour outside white/silver/grey/black',
    applies: hasNonPreferredColor,
    effect: percent(-2),
  },
];
