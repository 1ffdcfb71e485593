import type { AdjustmentRule } from '@valuation/domain';
import type { ValuationContext } from './context.js';
import { percent } from './rules.js';

/** Delhi plus the NCR districts of Haryana and Uttar Pradesh. */
export const NCR_RTO_PREFIXES = ['DL', 'HR26', 'HR29', 'HR51', 'HR55', 'HR72', 'UP14', 'UP16'] as const;
export const SOUTH_INDIA_RTO_PREFIXES = ['KA', 'TS', 'TN', 'KL', 'AP'] as const;
export const COASTAL_CITIES = ['MUMBAI', 'CHENNAI', 'KOLKATA'] as const;

export const NCR_DIESEL_BAN_AGE_MONTHS = 96;
export const COASTAL_CORROSION_AGE_MONTHS = 60;

function hasPrefix(code: string, prefixes: readonly string[]): boolean {
  const normalized = code.toUpperCase();
  return prefixes.some((prefix) => normalized.startsWith(prefix));
}

/** Containment, so "NAVI MUMBAI" and "MUMBAI SUBURBAN" count. */
export function isCoastal(city: string): boolean {
  const normalized = city.toUpperCase();
  return COASTAL_CITIES.some((coastal) => normalized.includes(coastal));
}

export const REGIONAL_RULES: readonly AdjustmentRule<ValuationContext>[] = [
  {
    id: 'ncr-diesel-ban',
    description: 'Delhi/NCR diesel aged 8 years or more',
    applies: ({ record, age }) =>
      hasPrefix(record.registrationCode, NCR_RTO_PREFIXES) &&
      record.fuelType === 'Diesel' &&
      age.totalMonths >= NCR_DIESEL_BAN_AGE_MONTHS,
    effect: percent(-25),
  },
  {
    id: 'south-india-premium',
    description: 'Registered in KA/TS/TN/KL/AP',
    applies: ({ record }) => hasPrefix(record.registrationCode, SOUTH_INDIA_RTO_PREFIXES),
    effect: percent(12),
  },
  {
    id: 'coastal-corrosion',
    description: 'Coastal city, 5 years or older',
    applies: ({ record, age }) =>
      isCoastal(record.city) &&
      age.totalMonths >= COASTAL_CORROSION_AGE_MONTHS,
    effect: percent(-4),
  },
];
