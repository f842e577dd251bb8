// Decoded measurement values as delivered by a transport

export type UnitTag = string;

export type UnitSystem = 'metric' | 'imperial';

export interface Measurement {
  value: number;
  unit: UnitTag;
}

export interface MilStatus {
  milOn: boolean;
  dtcCount: number;
}

export interface FuelSystemStatus {
  system1: number;
  system2: number;
}

export function milStatusEquals(a: MilStatus | null, b: MilStatus | null): boolean {
  if (a === null || b === null) return a === b;
  return a.milOn === b.milOn && a.dtcCount === b.dtcCount;
}

export function fuelStatusEquals(a: FuelSystemStatus | null, b: FuelSystemStatus | null): boolean {
  if (a === null || b === null) return a === b;
  return a.system1 === b.system1 && a.system2 === b.system2;
}
