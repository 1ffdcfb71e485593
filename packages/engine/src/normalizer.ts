import { NormalizationError, normalizeCacheKey } from '@valuation/domain';
import type {
  BodyType,
  CacheKey,
  FuelType,
  RawVehicleAttributes,
  VehicleClass,
  VehicleRecord,
} from '@valuation/domain';

export interface NormalizedVehicle {
  record: VehicleRecord;
  cacheKey: CacheKey;
}

// Trailing tokens dropped from a maker description ("MARUTI SUZUKI INDIA LTD").
const ENTITY_SUFFIX_TOKENS = new Set([
  'INDIA',
  'LTD',
  'LIMITED',
  'PVT',
  'PRIVATE',
  'MOTOR',
  'MOTORS',
  'MOTORCYCLE',
  'MOTORCYCLES',
  'SCOOTER',
  'SCOOTERS',
  'COMPANY',
  'CO',
  'INC',
  'CORPORATION',
  'CORP',
  'AUTO',
  '&',
  'AND',
]);

const BODY_TYPE_KEYWORDS: ReadonlyArray<[string, BodyType]> = [
  ['LUXURY', 'Luxury'],
  ['COUPE', 'Luxury'],
  ['CONVERTIBLE', 'Luxury'],
  ['SEDAN', 'Sedan'],
  ['SUV', 'SUV'],
  ['MUV', 'SUV'],
  ['HATCHBACK', 'Hatchback'],
];

const TWO_WHEELER_PATTERN = /SCOOTER|MOTOR\s?CYCLE|MOPED|\b2W|TWO[\s-]?WHEELER/;

function clean(value: string | undefined): string {
  return (value ?? '').trim().replace(/\s+/g, ' ');
}

export function normalizeMake(makerDescription: string): string {
  const tokens = clean(makerDescription).toUpperCase().split(' ').filter(Boolean);
  while (tokens.length > 1) {
    const last = tokens[tokens.length - 1] ?? '';
    if (!ENTITY_SUFFIX_TOKENS.has(last.replace(/[.,]/g, ''))) break;
    tokens.pop();
  }
  return tokens.join(' ');
}

export function extractBaseModel(model: string): string {
  return (clean(model).split(' ')[0] ?? '').toUpperCase();
}

/**
 * Accepts `YYYY`, `YYYY-MM`, `YYYY-MM-DD`, `YYYY/MM`, `MM/YYYY` (or `MM-YYYY`)
 * and `DD/MM/YYYY` (or `DD-MM-YYYY`, `DD.MM.YYYY`). Month defaults to January
 * only when the text carries a year and nothing else numeric.
 */
export function parseManufacturingDate(value: string): { year: string; month: number } {
  const text = clean(value);
  const yearFirst = /^(\d{4})(?:[-/](\d{1,2}))?/.exec(text);
  const dayFirst = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})\b/.exec(text);
  const monthFirst = /^(\d{1,2})[-/](\d{4})\b/.exec(text);

  let year: string | undefined;
  let month = 1;
  if (yearFirst?.[1]) {
    year = yearFirst[1];
    if (yearFirst[2]) month = parseInt(yearFirst[2], 10);
  } else if (dayFirst?.[2] && dayFirst[3]) {
    month = parseInt(dayFirst[2], 10);
    year = dayFirst[3];
  } else if (monthFirst?.[1] && monthFirst[2]) {
    month = parseInt(monthFirst[1], 10);
    year = monthFirst[2];
  } else {
    const numbers = text.match(/\d+/g) ?? [];
    year = numbers.length === 1 ? /\b(\d{4})\b/.exec(text)?.[1] : undefined;
  }

  if (!year || Number(year) < 1900 || Number(year) > 2100) {
    throw new NormalizationError('manufacturingDate', `Unparseable manufacturing date: "${text}"`);
  }
  if (month < 1 || month > 12) {
    throw new NormalizationError('manufacturingDate', `Invalid manufacturing month in "${text}"`);
  }
  return { year, month };
}

export function mapFuelType(value: string | undefined): FuelType {
  const text = clean(value).toUpperCase();
  if (/ELECTRIC|BATTERY|^B?EV$/.test(text)) return 'Electric';
  if (text.includes('DIESEL')) return 'Diesel';
  if (/CNG|LPG/.test(text)) return 'CNG';
  return 'Petrol';
}

export function mapBodyType(value: string | undefined): BodyType {
  const text = clean(value).toUpperCase();
  for (const [keyword, bodyType] of BODY_TYPE_KEYWORDS) {
    if (text.includes(keyword)) return bodyType;
  }
  return 'Hatchback';
}

export function detectVehicleClass(category: string | undefined, bodyType?: string): VehicleClass {
  const text = `${clean(category)} ${clean(bodyType)}`.toUpperCase();
  return TWO_WHEELER_PATTERN.test(text) ? '2W' : '4W';
}

/**
 * First comma-separated token of the registration location, else of the
 * address, without RTO qualifiers: "MUMBAI (WEST), Maharashtra" → "MUMBAI".
 */
export function extractCity(registeredAt?: string, address?: string): string {
  const source = clean(registeredAt) || clean(address);
  return clean((source.split(',')[0] ?? '').replace(/\([^)]*\)/g, ' ')).toUpperCase();
}

/** Last comma-separated token of the registration location: "DELHI, Delhi" → "DELHI". */
export function extractState(registeredAt?: string): string | undefined {
  const parts = clean(registeredAt).split(',');
  if (parts.length < 2) return undefined;
  const state = clean(parts[parts.length - 1]).toUpperCase();
  return state && !/^\d+$/.test(state) ? state : undefined;
}

export function extractRegistrationCode(registrationCode?: string, rcNumber?: string): string {
  const explicit = clean(registrationCode).replace(/\s/g, '').toUpperCase();
  if (explicit) return explicit;
  return clean(rcNumber).replace(/[^A-Za-z0-9]/g, '').toUpperCase().slice(0, 4);
}

function parseOwnerCount(value: number | string | undefined): number {
  const parsed = typeof value === 'number' ? value : parseInt(clean(value), 10);
  return Number.isInteger(parsed) && parsed >= 1 ? parsed : 1;
}

function parsePositive(value: number | string | undefined): number | undefined {
  const parsed = typeof value === 'number' ? value : parseFloat(clean(value));
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export function cacheKeyOf(record: VehicleRecord): CacheKey {
  return normalizeCacheKey({
    make: record.make,
    baseModel: record.baseModel,
    manufacturingYear: record.manufacturingYear,
    city: record.city,
  });
}

/**
 * Canonicalizes raw attributes into a VehicleRecord. Age always comes from the
 * manufacturing date; a registration date, if present, is ignored.
 */
export function normalizeVehicle(raw: RawVehicleAttributes): NormalizedVehicle {
  const make = normalizeMake(raw.make ?? '');
  if (!make) throw new NormalizationError('make', 'Vehicle make is required');

  const fullModel = clean(raw.model).toUpperCase();
  if (!fullModel) throw new NormalizationError('model', 'Vehicle model is required');

  if (!clean(raw.manufacturingDate)) {
    throw new NormalizationError('manufacturingDate', 'Manufacturing date is required');
  }
  const { year, month } = parseManufacturingDate(raw.manufacturingDate ?? '');

  const variant = clean(raw.variant);
  const color = clean(raw.color);
  const emissionNorm = clean(raw.normsType);
  const engineCapacityCc = parsePositive(raw.cubicCapacity);
  const state = extractState(raw.registeredAt);
  const record: VehicleRecord = {
    make,
    baseModel: extractBaseModel(fullModel),
    fullModel,
    ...(variant ? { variant } : {}),
    fuelType: mapFuelType(raw.fuelType),
    manufacturingYear: year,
    manufacturingMonth: month,
    registrationCode: extractRegistrationCode(raw.registrationCode, raw.rcNumber),
    city: extractCity(raw.registeredAt, raw.address),
    ...(state ? { state } : {}),
    bodyType: mapBodyType(raw.bodyType),
    vehicleClass: detectVehicleClass(raw.vehicleCategory, raw.bodyType),
    ...(color ? { color } : {}),
    ownerCount: parseOwnerCount(raw.ownerCount),
    ...(raw.odometer !== undefined && raw.odometer >= 0 ? { odometer: raw.odometer } : {}),
    ...(engineCapacityCc !== undefined ? { engineCapacityCc } : {}),
    ...(emissionNorm ? { emissionNorm: emissionNorm.toUpperCase() } : {}),
  };

  return { record, cacheKey: cacheKeyOf(record) };
}
