// Stream Supervisor: owns the single continuous-update subscription and routes its results

import { STATUS_PIDS } from '../../config/constants';
import { ParameterId, describeParameterSet, parseParameterId } from '../../models/Parameter';
import {
  FuelSystemStatus,
  Measurement,
  MilStatus,
  UnitSystem,
  fuelStatusEquals,
  milStatusEquals,
} from '../../models/Measurement';
import { troubleCodesEqual } from '../../models/TroubleCode';
import { TelemetryStore } from '../../store/telemetryStore';
import { logger, LogCategory } from '../../utils/Logger';
import { DebugLogger } from '../debug/DebugLogger';
import { dtcSeverityClassifier } from '../obd/DtcSeverityClassifier';
import { StatisticsTable } from '../stats/ParameterStatistics';
import { StreamItem, StreamSubscription, VehicleTransport } from '../transport/types';

export interface StreamSupervisorOptions {
  intervalMs: number;
  units: UnitSystem;
}

interface ActiveStream {
  generation: number;
  parameters: ReadonlySet<ParameterId>;
  subscription: StreamSubscription;
}

export class StreamSupervisor {
  private active: ActiveStream | null = null;
  private generation = 0;
  private units: UnitSystem;
  private readonly intervalMs: number;

  constructor(
    private readonly transport: VehicleTransport,
    private readonly statistics: StatisticsTable,
    private readonly store: TelemetryStore,
    private readonly events: DebugLogger,
    options: StreamSupervisorOptions
  ) {
    this.intervalMs = options.intervalMs;
    this.units = options.units;
  }

  /** Parameter set of the live subscription, or null when nothing is streaming. */
  getActiveParameters(): ReadonlySet<ParameterId> | null {
    return this.active?.parameters ?? null;
  }

  isStreaming(): boolean {
    return this.active !== null;
  }

  setUnits(units: UnitSystem): void {
    this.units = units;
  }

  start(parameters: ReadonlySet<ParameterId>): void {
    if (this.active) {
      logger.warn(LogCategory.STREAM, 'start() called with a live subscription; replacing it');
      this.cancelActive();
    }

    if (parameters.size === 0) {
      logger.info(LogCategory.STREAM, 'No interested parameters to monitor');
      this.events.logEvent('Nothing to monitor');
      this.store.setState({ streaming: [], monitoring: 'nothing-to-monitor' });
      return;
    }

    const generation = ++this.generation;
    const requested = new Set(parameters);
    const ids = [...requested].sort();

    let subscription: StreamSubscription;
    try {
      subscription = this.transport.subscribe(
        ids,
        {
          onBatch: (items) => {
            if (this.isCurrent(generation)) this.route(items);
          },
          onError: (error) => {
            if (!this.isCurrent(generation)) return;
            logger.error(LogCategory.STREAM, `Continuous updates reported an error: ${error.message}`);
            this.events.logError('Stream error', error);
          },
          onClose: (error) => {
            if (this.isCurrent(generation)) this.handleStreamClosed(error);
          },
        },
        { intervalMs: this.intervalMs, units: this.units }
      );
    } catch (error) {
      logger.error(LogCategory.STREAM, 'Failed to open continuous updates', error);
      this.events.logError('Subscribe failed', error);
      this.store.setState({ streaming: [], monitoring: 'idle' });
      return;
    }

    this.active = { generation, parameters: requested, subscription };
    logger.info(LogCategory.STREAM, `Starting continuous updates for ${ids.length} parameters`, {
      parameters: describeParameterSet(ids),
    });
    this.events.logSubscribe(ids);
    this.store.setState({ streaming: ids, monitoring: 'streaming' });
  }

  /**
   * Cancels the current subscription (if any) before opening the replacement,
   * so two subscriptions never overlap.
   */
  restart(parameters: ReadonlySet<ParameterId>): void {
    this.cancelActive();
    this.start(parameters);
  }

  stop(): void {
    this.cancelActive();
    this.store.setState({ streaming: [], monitoring: 'idle' });
  }

  private isCurrent(generation: number): boolean {
    return this.active !== null && this.active.generation === generation;
  }

  private cancelActive(): void {
    const active = this.active;
    if (!active) return;

    this.active = null;
    try {
      active.subscription.cancel();
    } catch (error) {
      logger.error(LogCategory.STREAM, 'Cancelling continuous updates failed', error);
    }
    this.events.logCancel([...active.parameters].sort());
  }

  private handleStreamClosed(error?: Error): void {
    if (error) {
      logger.error(LogCategory.STREAM, `Continuous updates failed: ${error.message}`);
      this.events.logError('Stream closed with error', error);
    } else {
      logger.info(LogCategory.STREAM, 'Continuous updates ended by transport');
    }
    this.cancelActive();
    this.store.setState({ streaming: [], monitoring: 'idle' });
  }

  private route(items: StreamItem[]): void {
    const active = this.active;
    if (!active) return;

    const measurements: Array<readonly [ParameterId, Measurement]> = [];

    for (const { parameterId, result } of items) {
      if (!active.parameters.has(parameterId)) {
        logger.debug(LogCategory.STREAM, 'Ignoring result for parameter outside the subscription', { parameterId });
        continue;
      }

      const command = parseParameterId(parameterId);
      switch (command.kind) {
        case 'mode1':
          if (command.pid === STATUS_PIDS.MIL_STATUS) {
            if (result.type === 'milStatus') this.publishMilStatus(result.status);
          } else if (command.pid === STATUS_PIDS.FUEL_SYSTEM_STATUS) {
            if (result.type === 'fuelStatus') this.publishFuelStatus(result.status);
          } else if (result.type === 'measurement') {
            this.collect(measurements, parameterId, result.measurement);
          }
          break;
        case 'gmMode22':
          if (result.type === 'measurement') {
            this.collect(measurements, parameterId, result.measurement);
          }
          break;
        case 'mode3':
          if (result.type === 'troubleCodes') this.publishTroubleCodes(result.codes);
          break;
        case 'unrecognized':
          break;
      }
    }

    this.statistics.applyBatch(measurements);
  }

  private collect(
    measurements: Array<readonly [ParameterId, Measurement]>,
    parameterId: ParameterId,
    measurement: Measurement
  ): void {
    // A non-finite reading would pin min/max for the rest of the window
    if (!Number.isFinite(measurement.value)) {
      logger.debug(LogCategory.STREAM, 'Ignoring non-finite measurement', {
        parameterId,
        value: String(measurement.value),
      });
      return;
    }
    measurements.push([parameterId, measurement]);
  }

  private publishMilStatus(status: MilStatus): void {
    if (!milStatusEquals(this.store.getState().milStatus, status)) {
      this.store.setState({ milStatus: { ...status } });
    }
  }

  private publishFuelStatus(status: FuelSystemStatus): void {
    if (!fuelStatusEquals(this.store.getState().fuelStatus, status)) {
      this.store.setState({ fuelStatus: { ...status } });
    }
  }

  private publishTroubleCodes(codes: string[]): void {
    const classified = dtcSeverityClassifier.classify(codes);
    if (!troubleCodesEqual(this.store.getState().troubleCodes, classified)) {
      this.store.setState({ troubleCodes: classified });
    }
  }
}
