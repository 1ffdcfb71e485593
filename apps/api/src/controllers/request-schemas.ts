import { z } from 'zod';
import type { ManualValuationCommand, RawVehicleAttributes } from '@valuation/domain';

const price = z.coerce.number().positive();
const text = z.string().trim().min(1);

export const rcNumberSchema = z.string().trim().min(4).max(20);

/** Vehicle fields accepted by the manual and batch resale endpoints. */
export const manualVehicleSchema = z.object({
  make: text,
  model: text,
  variant: text.optional(),
  manufacturing_date: text,
  reg_date: text.optional(),
  registration_number: text.optional(),
  fuel_type: text.optional(),
  rto_code: text.optional(),
  city: text.optional(),
  body_type: text.optional(),
  vehicle_category: text.optional(),
  color: text.optional(),
  owner_count: z.coerce.number().int().min(1).optional(),
  odometer: z.coerce.number().nonnegative().optional(),
  current_ex_showroom: price,
  market_listings_mean: price.optional(),
  market_listing_count: z.coerce.number().int().nonnegative().optional(),
  discontinued: z.boolean().optional(),
  new_generation_launched: z.boolean().optional(),
});

export type ManualVehicleBody = z.infer<typeof manualVehicleSchema>;

export function toManualCommand(body: ManualVehicleBody): ManualValuationCommand {
  const vehicle: RawVehicleAttributes = {
    rcNumber: body.registration_number,
    make: body.make,
    model: body.model,
    variant: body.variant,
    manufacturingDate: body.manufacturing_date,
    registrationDate: body.reg_date,
    fuelType: body.fuel_type,
    registrationCode: body.rto_code,
    registeredAt: body.city,
    bodyType: body.body_type,
    vehicleCategory: body.vehicle_category,
    color: body.color,
    ownerCount: body.owner_count,
    odometer: body.odometer,
  };
  return {
    vehicle,
    currentExShowroom: body.current_ex_showroom,
    marketListingsMean: body.market_listings_mean,
    marketListingCount: body.market_listing_count,
    discontinued: body.discontinued,
    newGenerationLaunched: body.new_generation_launched,
  };
}

export const registrationValuationSchema = z.object({
  rc_number: rcNumberSchema,
  current_ex_showroom: price,
  market_listings_mean: price.optional(),
  market_listing_count: z.coerce.number().int().nonnegative().optional(),
});

export const batchSchema = z.object({
  vehicles: z.array(z.unknown()).min(1).max(100),
});

export const idvCalculateSchema = z.object({
  rc_data: z.record(z.unknown()),
  original_on_road_price: price,
  market_median_estimate: price.optional(),
});

export const registrationIdvSchema = z.object({
  rc_number: rcNumberSchema,
  original_on_road_price: price,
  market_median_estimate: price.optional(),
});

export const rcOnlySchema = z.object({
  rc_number: rcNumberSchema,
});

export const skipCacheQuerySchema = z.object({
  skip_cache: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v === 'true'),
});

export const recentQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});
