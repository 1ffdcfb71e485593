export interface DepreciationBand {
  readonly lowerMonths: number;
  /** Exclusive; `Infinity` for the open-ended last band. */
  readonly upperMonths: number;
  readonly percent: number;
}

export type DepreciationScheduleId = 'resale' | 'idv-2w' | 'idv-4w';

export interface DepreciationSchedule {
  readonly id: DepreciationScheduleId;
  readonly bands: readonly DepreciationBand[];
}
