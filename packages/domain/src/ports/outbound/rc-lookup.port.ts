import type { RawVehicleAttributes } from '../../entities/vehicle.js';

export interface RcLookupResult {
  readonly rcNumber: string;
  readonly attributes: RawVehicleAttributes;
  /** Upstream payload as received, kept for audit display. */
  readonly raw: Record<string, unknown>;
}

export interface RcLookupPort {
  /** Throws `CollaboratorError` on any failure; callers do not retry. */
  fetchByRegistration(rcNumber: string): Promise<RcLookupResult>;
}
