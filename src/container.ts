// Composition root: builds one instance of each component and wires them together

import { UnitSystem } from './models/Measurement';
import { PidCatalog } from './services/catalog/PidCatalog';
import { PidSelection } from './services/catalog/PidSelection';
import { ConnectionLifecycle } from './services/connection/ConnectionLifecycle';
import { DebugLogger } from './services/debug/DebugLogger';
import { InterestRegistry } from './services/interest/InterestRegistry';
import { TaskQueue } from './services/interest/TaskQueue';
import { StatisticsTable } from './services/stats/ParameterStatistics';
import { StreamSupervisor } from './services/streaming/StreamSupervisor';
import { VehicleTransport } from './services/transport/types';
import { TelemetryStore, createTelemetryStore } from './store/telemetryStore';

export interface BridgeOptions {
  transport: VehicleTransport;
  catalog?: PidCatalog;
  units?: UnitSystem;
  streamIntervalMs?: number;
  querySupportedPids?: boolean;
}

export interface Bridge {
  transport: VehicleTransport;
  catalog: PidCatalog;
  selection: PidSelection;
  queue: TaskQueue;
  registry: InterestRegistry;
  statistics: StatisticsTable;
  store: TelemetryStore;
  events: DebugLogger;
  supervisor: StreamSupervisor;
  lifecycle: ConnectionLifecycle;
  dispose(): void;
}

export function createBridge(options: BridgeOptions): Bridge {
  const units = options.units ?? 'metric';
  const catalog = options.catalog ?? PidCatalog.standard();
  const store = createTelemetryStore(units);
  const events = new DebugLogger();
  const queue = new TaskQueue();
  const registry = new InterestRegistry(queue);
  const statistics = new StatisticsTable(stats => store.setState({ stats }));
  const supervisor = new StreamSupervisor(options.transport, statistics, store, events, {
    intervalMs: options.streamIntervalMs ?? 1000,
    units,
  });
  const lifecycle = new ConnectionLifecycle(options.transport, registry, supervisor, statistics, store, events, {
    querySupportedPids: options.querySupportedPids ?? true,
  });

  return {
    transport: options.transport,
    catalog,
    selection: new PidSelection(catalog),
    queue,
    registry,
    statistics,
    store,
    events,
    supervisor,
    lifecycle,
    dispose: () => {
      lifecycle.disconnect();
      lifecycle.dispose();
    },
  };
}
