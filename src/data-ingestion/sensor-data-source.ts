/**
 * Sensor data sources
 * One capability, "deliver readings for a sensor over a day window", with one
 * implementation per backend. Network backends live outside this package.
 */

import { isAfter, isBefore, subDays } from 'date-fns';
import type { Reading, SensorDataResult } from '../types/sensor-data';

export interface SensorDataSource {
  readonly name: string;
  getMeasurements(sensorId: string, days: number): Promise<SensorDataResult>;
}

/**
 * In-process source over preloaded readings, e.g. a static export or a test fixture
 */
export class InMemorySensorDataSource implements SensorDataSource {
  readonly name = 'in-memory';
  private readings = new Map<string, Reading[]>();

  constructor(
    initial: Record<string, Reading[]> = {},
    private readonly now: () => Date = () => new Date()
  ) {
    for (const [sensorId, readings] of Object.entries(initial)) {
      this.setReadings(sensorId, readings);
    }
  }

  public setReadings(sensorId: string, readings: Reading[]): void {
    const ordered = [...readings].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    this.readings.set(sensorId, ordered);
  }

  /**
   * Readings within the last `days` days, bounds included
   */
  public async getMeasurements(sensorId: string, days: number): Promise<SensorDataResult> {
    const stored = this.readings.get(sensorId);
    if (!stored) {
      return { kind: 'no_data', sensorId, reason: `Unknown sensor ${sensorId}` };
    }

    const end = this.now();
    const start = subDays(end, days);
    const readings = stored.filter(r => !isBefore(r.timestamp, start) && !isAfter(r.timestamp, end));

    if (readings.length === 0) {
      return { kind: 'no_data', sensorId, reason: `No readings in the last ${days} days` };
    }

    return { kind: 'data', sensorId, readings };
  }
}
