/**
 * Plant profile loader
 * Parses the JSON configuration format into validated PlantProfile values
 */

import { promises as fs } from 'fs';
import type { OptimalRange, PlantProfile } from '../types/plant-profile';
import { ProfileNotFoundError, ValidationError } from '../shared/utils/errors';
import { Validator, isRecord } from '../shared/utils/validation';

function readNumber(value: unknown, field: string, errors: string[]): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push(`${field} must be a number`);
    return NaN;
  }
  return value;
}

function readStringMap(value: unknown, field: string, errors: string[]): Record<string, string> {
  const mapped: Record<string, string> = {};
  if (value === undefined) return mapped;
  if (!isRecord(value)) {
    errors.push(`${field} must be an object`);
    return mapped;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string' || typeof entry === 'number') {
      mapped[key] = String(entry);
    } else {
      errors.push(`${field}.${key} must be a sensor id`);
    }
  }
  return mapped;
}

/**
 * Parse one entry of `plant_profiles`
 */
export function parsePlantProfile(profileId: string, raw: unknown): PlantProfile {
  const errors: string[] = [];

  if (!isRecord(raw)) {
    throw new ValidationError(`Profile ${profileId} must be an object`);
  }

  const type = raw.type;
  if (typeof type !== 'string' || type.trim().length === 0) {
    errors.push(`${profileId}.type is required and must be a string`);
  }

  const baseGrowthRate = raw.base_growth_rate === undefined
    ? 0
    : readNumber(raw.base_growth_rate, `${profileId}.base_growth_rate`, errors);

  const optimalRanges: Record<string, OptimalRange> = {};
  if (!isRecord(raw.optimal_ranges)) {
    errors.push(`${profileId}.optimal_ranges must be an object`);
  } else {
    for (const [parameter, range] of Object.entries(raw.optimal_ranges)) {
      if (!isRecord(range)) {
        errors.push(`${profileId}.optimal_ranges.${parameter} must be an object`);
        continue;
      }
      optimalRanges[parameter] = {
        min: readNumber(range.min, `${profileId}.optimal_ranges.${parameter}.min`, errors),
        max: readNumber(range.max, `${profileId}.optimal_ranges.${parameter}.max`, errors),
        unit: typeof range.unit === 'string' ? range.unit : ''
      };
    }
  }

  const sensorMapping = readStringMap(raw.sensor_mapping, `${profileId}.sensor_mapping`, errors);

  let weights: Record<string, number> | undefined;
  if (raw.weights !== undefined) {
    weights = {};
    if (!isRecord(raw.weights)) {
      errors.push(`${profileId}.weights must be an object`);
    } else {
      for (const [parameter, weight] of Object.entries(raw.weights)) {
        weights[parameter] = readNumber(weight, `${profileId}.weights.${parameter}`, errors);
      }
    }
  }

  if (errors.length > 0) {
    throw new ValidationError(errors.join('; '), errors);
  }

  const profile: PlantProfile = {
    profileId,
    type: typeof type === 'string' ? type : '',
    baseGrowthRate,
    optimalRanges,
    sensorMapping,
    ...(weights ? { weights } : {})
  };

  // min > max is left for the analyzer to report as InvalidRangeError
  Validator.throwIfInvalid(Validator.validateProfile(profile));
  return profile;
}

/**
 * Parse a whole configuration document: `{ "plant_profiles": { ... } }`
 */
export function parsePlantProfiles(document: unknown): Map<string, PlantProfile> {
  if (!isRecord(document) || !isRecord(document.plant_profiles)) {
    throw new ValidationError('Configuration must contain a plant_profiles object');
  }

  const profiles = new Map<string, PlantProfile>();
  for (const [profileId, raw] of Object.entries(document.plant_profiles)) {
    profiles.set(profileId, parsePlantProfile(profileId, raw));
  }
  return profiles;
}

export async function loadPlantProfiles(filePath: string): Promise<Map<string, PlantProfile>> {
  const content = await fs.readFile(filePath, 'utf8');
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Configuration file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parsePlantProfiles(document);
}

export function getPlantProfile(profiles: ReadonlyMap<string, PlantProfile>, profileId: string): PlantProfile {
  const profile = profiles.get(profileId);
  if (!profile) {
    throw new ProfileNotFoundError(profileId);
  }
  return profile;
}
