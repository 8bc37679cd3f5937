import { describe, it, expect } from 'vitest';
import * as path from 'path';
import {
  getPlantProfile,
  loadPlantProfiles,
  parsePlantProfile,
  parsePlantProfiles
} from '../../src/data-ingestion/profile-loader';
import { ProfileNotFoundError, ValidationError } from '../../src/shared/utils/errors';

const fixture = (name: string): string => path.join(__dirname, '..', 'fixtures', name);

describe('profile loader', () => {
  it('loads every profile from a configuration file', async () => {
    const profiles = await loadPlantProfiles(fixture('plant-profiles.json'));

    expect([...profiles.keys()]).toEqual(['tomato', 'basil']);

    const tomato = getPlantProfile(profiles, 'tomato');
    expect(tomato).toEqual({
      profileId: 'tomato',
      type: 'vegetable',
      baseGrowthRate: 1.5,
      optimalRanges: {
        temperature: { min: 20, max: 26, unit: '°C' },
        humidity: { min: 60, max: 80, unit: '%' },
        soil_moisture: { min: 60, max: 80, unit: '%' }
      },
      sensorMapping: { temperature: 'input-1', humidity: 'input-2', soil_moisture: '7' }
    });

    expect(getPlantProfile(profiles, 'basil').weights).toEqual({ temperature: 2, light: 1 });
  });

  it('reports a file that is not valid JSON', async () => {
    await expect(loadPlantProfiles(fixture('truncated.json'))).rejects.toBeInstanceOf(ValidationError);
  });

  it('requires a plant_profiles object', () => {
    expect(() => parsePlantProfiles({ profiles: {} })).toThrow('Configuration must contain a plant_profiles object');
  });

  it('collects every field error', () => {
    try {
      parsePlantProfile('fern', {
        type: 'foliage',
        optimal_ranges: { humidity: { min: '50', max: 90 } },
        weights: { humidity: 'high' }
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.errors).toEqual([
          'fern.optimal_ranges.humidity.min must be a number',
          'fern.weights.humidity must be a number'
        ]);
      }
    }
  });

  it('defaults the growth rate and unit', () => {
    const profile = parsePlantProfile('cactus', {
      type: 'succulent',
      optimal_ranges: { soil_moisture: { min: 10, max: 30 } }
    });
    expect(profile.baseGrowthRate).toBe(0);
    expect(profile.optimalRanges.soil_moisture.unit).toBe('');
    expect(profile.sensorMapping).toEqual({});
  });

  it('rejects negative weights', () => {
    expect(() => parsePlantProfile('mint', {
      type: 'herb',
      optimal_ranges: { light: { min: 1, max: 2, unit: 'klux' } },
      weights: { light: -1 }
    })).toThrow(ValidationError);
  });

  it('throws ProfileNotFoundError for an unknown id', () => {
    expect(() => getPlantProfile(new Map(), 'orchid')).toThrow(ProfileNotFoundError);
  });
});
