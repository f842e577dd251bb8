// Connection lifecycle: gates streaming on the transport connection state and
// turns interest changes into supervisor restarts while connected

import { ParameterId, parseParameterId } from '../../models/Parameter';
import { UnitSystem } from '../../models/Measurement';
import { TelemetryStore } from '../../store/telemetryStore';
import { logger, LogCategory } from '../../utils/Logger';
import { DebugLogger } from '../debug/DebugLogger';
import { InterestRegistry } from '../interest/InterestRegistry';
import { dtcSeverityClassifier } from '../obd/DtcSeverityClassifier';
import { StatisticsTable } from '../stats/ParameterStatistics';
import { StreamSupervisor } from '../streaming/StreamSupervisor';
import { VehicleTransport, reasonOf } from '../transport/types';
import {
  CONNECTED,
  CONNECTING,
  ConnectionState,
  DISCONNECTED,
  connectionStatesEqual,
  describeConnectionState,
  failed,
} from './types';

export interface ConnectionLifecycleOptions {
  querySupportedPids: boolean;
}

export class ConnectionLifecycle {
  private state: ConnectionState = DISCONNECTED;
  // Bumped by every connect and teardown; a handshake whose attempt is stale is discarded
  private attempt = 0;
  // Mode 01 ids the vehicle supports; null = not queried, no filtering
  private supportedMode1: ReadonlySet<ParameterId> | null = null;
  private readonly unsubscribers: Array<() => void> = [];

  constructor(
    private readonly transport: VehicleTransport,
    private readonly registry: InterestRegistry,
    private readonly supervisor: StreamSupervisor,
    private readonly statistics: StatisticsTable,
    private readonly store: TelemetryStore,
    private readonly events: DebugLogger,
    private readonly options: ConnectionLifecycleOptions
  ) {
    this.unsubscribers.push(
      this.registry.subscribe(interested => this.handleInterestChanged(interested)),
      this.transport.onLinkLost(reason => this.handleLinkLost(reason))
    );
    this.store.setState({ interested: [...this.registry.getInterested()].sort() });
  }

  getState(): ConnectionState {
    return this.state;
  }

  async connect(): Promise<void> {
    if (this.state.status === 'connecting' || this.state.status === 'connected') {
      logger.warn(LogCategory.LIFECYCLE, 'Connection attempt ignored, already connected or connecting.');
      return;
    }

    const attempt = ++this.attempt;
    this.events.startSession();
    this.setState(CONNECTING);

    try {
      await this.transport.open();
    } catch (error) {
      if (attempt !== this.attempt) return;
      const reason = reasonOf(error);
      logger.error(LogCategory.LIFECYCLE, `OBD-II connection failed: ${reason}`);
      this.events.logError('Handshake failed', error);
      this.setState(failed(reason));
      return;
    }

    if (attempt !== this.attempt) {
      logger.info(LogCategory.LIFECYCLE, 'Handshake finished after the attempt was abandoned; discarding');
      return;
    }

    this.supportedMode1 = this.options.querySupportedPids ? await this.querySupported() : null;
    if (attempt !== this.attempt) return;

    this.setState(CONNECTED);
    this.store.setState({ connectedPeripheralName: this.transport.peripheralName });
    logger.info(LogCategory.LIFECYCLE, 'OBD-II connected successfully.');

    this.supervisor.start(this.effectiveParameters(this.registry.getInterested()));

    await this.loadTroubleCodes(attempt);
  }

  disconnect(): void {
    this.attempt++;
    this.teardown();
    this.setState(DISCONNECTED);
    logger.info(LogCategory.LIFECYCLE, 'OBD-II disconnected.');
  }

  /**
   * Switching units resets every statistics window and, while connected,
   * restarts the stream so new readings arrive in the new units.
   */
  setUnits(units: UnitSystem): void {
    if (this.store.getState().units === units) return;

    this.supervisor.setUnits(units);
    this.store.setState({ units });
    this.statistics.resetAll();
    logger.info(LogCategory.LIFECYCLE, `Units changed to ${units}; statistics reset.`);

    if (this.state.status === 'connected') {
      this.supervisor.restart(this.effectiveParameters(this.registry.getInterested()));
    }
  }

  resetStats(parameterId: ParameterId): boolean {
    return this.statistics.reset(parameterId);
  }

  resetAllStats(): void {
    this.statistics.resetAll();
    logger.info(LogCategory.LIFECYCLE, 'All parameter stats reset (min/max/sampleCount).');
  }

  dispose(): void {
    this.unsubscribers.splice(0).forEach(unsubscribe => unsubscribe());
  }

  private handleInterestChanged(interested: ReadonlySet<ParameterId>): void {
    this.store.setState({ interested: [...interested].sort() });

    if (this.state.status === 'connected') {
      this.supervisor.restart(this.effectiveParameters(interested));
    } else {
      logger.debug(LogCategory.LIFECYCLE, `Interest recorded while ${describeConnectionState(this.state)}`);
    }
  }

  private handleLinkLost(reason: string): void {
    if (this.state.status !== 'connected' && this.state.status !== 'connecting') return;

    logger.error(LogCategory.LIFECYCLE, `Transport reported link loss: ${reason}`);
    this.events.logError('Link lost', reason);
    this.attempt++;
    this.teardown();
    this.setState(failed(reason));
  }

  private teardown(): void {
    this.supervisor.stop();
    this.transport.close();
    this.supportedMode1 = null;
    this.statistics.clear();
    this.store.setState({
      connectedPeripheralName: null,
      milStatus: null,
      fuelStatus: null,
      troubleCodes: null,
    });
  }

  private effectiveParameters(interested: ReadonlySet<ParameterId>): Set<ParameterId> {
    const supported = this.supportedMode1;
    const result = new Set<ParameterId>();
    const unsupported: ParameterId[] = [];

    for (const id of interested) {
      const command = parseParameterId(id);
      if (command.kind === 'unrecognized') continue;
      if (command.kind === 'mode1' && supported !== null && !supported.has(id)) {
        unsupported.push(id);
        continue;
      }
      result.add(id);
    }

    if (unsupported.length > 0) {
      logger.debug(LogCategory.LIFECYCLE, 'Removing unsupported Mode 01 parameters', { unsupported });
    }
    return result;
  }

  private async querySupported(): Promise<ReadonlySet<ParameterId> | null> {
    try {
      return new Set(await this.transport.supportedParameters());
    } catch (error) {
      logger.warn(LogCategory.LIFECYCLE, 'Supported PID query failed; streaming without filtering', error);
      return null;
    }
  }

  private async loadTroubleCodes(attempt: number): Promise<void> {
    try {
      const codes = await this.transport.scanTroubleCodes();
      if (attempt !== this.attempt) return;
      this.store.setState({ troubleCodes: dtcSeverityClassifier.classify(codes) });
      logger.info(LogCategory.LIFECYCLE, `Trouble code scan found ${codes.length} codes`);
    } catch (error) {
      logger.warn(LogCategory.LIFECYCLE, 'Trouble code scan failed', error);
      this.events.logError('Trouble code scan failed', error);
    }
  }

  private setState(next: ConnectionState): void {
    if (connectionStatesEqual(this.state, next)) return;

    this.events.logTransition(describeConnectionState(this.state), describeConnectionState(next));
    this.state = next;
    this.store.setState({ connectionState: next });
  }
}
