// Published read-only state for UI consumers, backed by a zustand vanilla store

import { createStore, StoreApi } from 'zustand/vanilla';
import { ParameterId } from '../models/Parameter';
import { FuelSystemStatus, MilStatus, UnitSystem } from '../models/Measurement';
import { TroubleCode } from '../models/TroubleCode';
import { ConnectionState } from '../services/connection/types';
import { StatisticsSnapshot } from '../services/stats/ParameterStatistics';

export type MonitoringStatus = 'idle' | 'streaming' | 'nothing-to-monitor';

export interface TelemetryState {
  connectionState: ConnectionState;
  connectedPeripheralName: string | null;
  units: UnitSystem;

  // Demand and the set actually being streamed
  interested: ParameterId[];
  streaming: ParameterId[];
  monitoring: MonitoringStatus;

  stats: Record<ParameterId, StatisticsSnapshot>;

  // null = not yet received
  milStatus: MilStatus | null;
  fuelStatus: FuelSystemStatus | null;
  troubleCodes: TroubleCode[] | null;
}

export type TelemetryStore = StoreApi<TelemetryState>;

export function initialTelemetryState(units: UnitSystem): TelemetryState {
  return {
    connectionState: { status: 'disconnected' },
    connectedPeripheralName: null,
    units,
    interested: [],
    streaming: [],
    monitoring: 'idle',
    stats: {},
    milStatus: null,
    fuelStatus: null,
    troubleCodes: null,
  };
}

export function createTelemetryStore(units: UnitSystem = 'metric'): TelemetryStore {
  return createStore<TelemetryState>()(() => initialTelemetryState(units));
}
