/**
 * Plant profile models
 * A profile binds a plant type to optimal environmental ranges and sensor ids
 */

export interface OptimalRange {
  readonly min: number;
  readonly max: number;
  readonly unit: string;
}

export interface PlantProfile {
  readonly profileId: string;
  readonly type: string;
  readonly baseGrowthRate: number; // cm/day, informational
  readonly optimalRanges: Readonly<Record<string, OptimalRange>>;
  readonly sensorMapping: Readonly<Record<string, string>>;
  readonly weights?: Readonly<Record<string, number>>;
}
