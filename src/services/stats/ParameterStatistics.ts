// Running latest/min/max/count statistics per parameter

import { ParameterId } from '../../models/Parameter';
import { Measurement } from '../../models/Measurement';

export interface StatisticsSnapshot {
  parameterId: ParameterId;
  latest: Measurement;
  min: number;
  max: number;
  sampleCount: number;
}

export class ParameterStatistics {
  readonly parameterId: ParameterId;
  private latestMeasurement: Measurement;
  private minValue: number;
  private maxValue: number;
  private count: number;

  private constructor(parameterId: ParameterId, first: Measurement) {
    this.parameterId = parameterId;
    this.latestMeasurement = { ...first };
    this.minValue = first.value;
    this.maxValue = first.value;
    this.count = 1;
  }

  get latest(): Measurement {
    return { ...this.latestMeasurement };
  }

  get min(): number {
    return this.minValue;
  }

  get max(): number {
    return this.maxValue;
  }

  get sampleCount(): number {
    return this.count;
  }

  static create(parameterId: ParameterId, firstMeasurement: Measurement): ParameterStatistics {
    return new ParameterStatistics(parameterId, firstMeasurement);
  }

  update(measurement: Measurement): void {
    const value = measurement.value;
    this.latestMeasurement = { ...measurement };
    if (value < this.minValue) this.minValue = value;
    if (value > this.maxValue) this.maxValue = value;
    this.count += 1;
  }

  /**
   * Starts a fresh min/max window at the most recent reading.
   */
  reset(): void {
    this.minValue = this.latestMeasurement.value;
    this.maxValue = this.latestMeasurement.value;
    this.count = 1;
  }

  toSnapshot(): StatisticsSnapshot {
    return {
      parameterId: this.parameterId,
      latest: this.latest,
      min: this.minValue,
      max: this.maxValue,
      sampleCount: this.count,
    };
  }
}

export type StatisticsPublisher = (snapshot: Record<ParameterId, StatisticsSnapshot>) => void;

/**
 * Owns every ParameterStatistics record. Each mutating call publishes exactly
 * one snapshot of the whole table.
 */
export class StatisticsTable {
  private readonly entries = new Map<ParameterId, ParameterStatistics>();

  constructor(private readonly publish: StatisticsPublisher = () => undefined) {}

  get size(): number {
    return this.entries.size;
  }

  get(parameterId: ParameterId): StatisticsSnapshot | undefined {
    return this.entries.get(parameterId)?.toSnapshot();
  }

  has(parameterId: ParameterId): boolean {
    return this.entries.has(parameterId);
  }

  applyBatch(measurements: ReadonlyArray<readonly [ParameterId, Measurement]>): void {
    if (measurements.length === 0) return;

    for (const [parameterId, measurement] of measurements) {
      const existing = this.entries.get(parameterId);
      if (existing) {
        existing.update(measurement);
      } else {
        this.entries.set(parameterId, ParameterStatistics.create(parameterId, measurement));
      }
    }
    this.publishSnapshot();
  }

  apply(parameterId: ParameterId, measurement: Measurement): void {
    this.applyBatch([[parameterId, measurement]]);
  }

  /** Returns false when no statistics exist yet for the parameter. */
  reset(parameterId: ParameterId): boolean {
    const entry = this.entries.get(parameterId);
    if (!entry) return false;
    entry.reset();
    this.publishSnapshot();
    return true;
  }

  resetAll(): void {
    for (const entry of this.entries.values()) {
      entry.reset();
    }
    this.publishSnapshot();
  }

  clear(): void {
    this.entries.clear();
    this.publishSnapshot();
  }

  snapshot(): Record<ParameterId, StatisticsSnapshot> {
    const result: Record<ParameterId, StatisticsSnapshot> = {};
    for (const [parameterId, entry] of this.entries) {
      result[parameterId] = entry.toSnapshot();
    }
    return result;
  }

  private publishSnapshot(): void {
    this.publish(this.snapshot());
  }
}
