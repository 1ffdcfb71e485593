// Normalized vehicle snapshot shared by the resale and IDV pipelines

export const FUEL_TYPES = ['Petrol', 'Diesel', 'CNG', 'Electric'] as const;
export type FuelType = (typeof FUEL_TYPES)[number];

export const BODY_TYPES = ['Hatchback', 'Sedan', 'SUV', 'Luxury'] as const;
export type BodyType = (typeof BODY_TYPES)[number];

/** 2W = scooters and motorcycles, 4W = everything else. */
export const VEHICLE_CLASSES = ['2W', '4W'] as const;
export type VehicleClass = (typeof VEHICLE_CLASSES)[number];

export interface VehicleRecord {
  readonly make: string;          // e.g. "MARUTI SUZUKI" (corporate suffixes stripped)
  readonly baseModel: string;     // e.g. "SWIFT"
  readonly fullModel: string;     // e.g. "SWIFT VXI"
  readonly variant?: string;
  readonly fuelType: FuelType;
  readonly manufacturingYear: string; // "2019"
  readonly manufacturingMonth: number; // 1-12
  readonly registrationCode: string;  // RTO prefix, e.g. "DL3C"
  readonly city: string;              // uppercased, e.g. "DELHI"
  readonly state?: string;            // uppercased, e.g. "MAHARASHTRA"
  readonly bodyType: BodyType;
  readonly vehicleClass: VehicleClass;
  readonly color?: string;
  readonly ownerCount: number;
  readonly odometer?: number;
  readonly engineCapacityCc?: number;
  readonly emissionNorm?: string;
}

/**
 * Attributes as they arrive from a registration lookup or a manual request,
 * before any cleanup. Every field is optional here; the normalizer decides
 * which absences are fatal.
 */
export interface RawVehicleAttributes {
  readonly rcNumber?: string;
  readonly make?: string;
  readonly model?: string;
  readonly variant?: string;
  readonly manufacturingDate?: string;
  readonly registrationDate?: string;
  readonly fuelType?: string;
  readonly registrationCode?: string;
  readonly registeredAt?: string;
  readonly address?: string;
  readonly color?: string;
  readonly ownerCount?: number | string;
  readonly bodyType?: string;
  readonly vehicleCategory?: string;
  readonly odometer?: number;
  readonly cubicCapacity?: string | number;
  readonly normsType?: string;
}

export interface VehicleAge {
  readonly years: number;
  readonly months: number;
  readonly totalMonths: number;
  /** Fractional years, `years + months / 12`. */
  readonly ageYears: number;
  readonly label: string; // "5 years 6 months"
}
