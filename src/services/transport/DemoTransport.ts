// Simulated vehicle transport for demos and local development

import { APP_CONSTANTS, STATUS_PIDS } from '../../config/constants';
import { ParameterId, parseParameterId } from '../../models/Parameter';
import { logger, LogCategory } from '../../utils/Logger';
import { PidCatalog, conversionFor } from '../catalog/PidCatalog';
import {
  DecodedResult,
  StreamHandlers,
  StreamOptions,
  StreamSubscription,
  TransportError,
  VehicleTransport,
} from './types';

export interface DemoTransportOptions {
  handshakeMs: number;
  // When set, every handshake fails with this reason
  failReason?: string;
  troubleCodes?: string[];
  peripheralName?: string;
}

export class DemoTransport implements VehicleTransport {
  private connected = false;
  // Bumped by close() so a handshake still in flight does not reconnect
  private session = 0;
  private readonly streams = new Set<NodeJS.Timeout>();
  private readonly linkListeners = new Set<(reason: string) => void>();
  private readonly troubleCodes: string[];
  private readonly name: string;

  constructor(
    private readonly catalog: PidCatalog,
    private readonly options: DemoTransportOptions
  ) {
    this.troubleCodes = options.troubleCodes ?? APP_CONSTANTS.DEMO_TROUBLE_CODES;
    this.name = options.peripheralName ?? 'Demo Vehicle';
  }

  get peripheralName(): string | null {
    return this.connected ? this.name : null;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async open(): Promise<void> {
    logger.info(LogCategory.TRANSPORT, 'Demo handshake started');
    const session = this.session;
    await delay(this.options.handshakeMs);

    if (this.options.failReason) {
      throw new TransportError(this.options.failReason);
    }
    if (session !== this.session) {
      throw new TransportError('Connection closed during handshake');
    }
    this.connected = true;
    logger.info(LogCategory.TRANSPORT, 'Demo handshake complete');
  }

  close(): void {
    this.session += 1;
    this.streams.forEach(timer => clearInterval(timer));
    this.streams.clear();
    if (this.connected) {
      logger.info(LogCategory.TRANSPORT, 'Demo connection closed');
    }
    this.connected = false;
  }

  subscribe(parameterIds: ParameterId[], handlers: StreamHandlers, options: StreamOptions): StreamSubscription {
    if (!this.connected) {
      throw new TransportError('Not connected to vehicle');
    }

    const unknown = parameterIds.filter(id => !this.catalog.has(id));
    const known = parameterIds.filter(id => this.catalog.has(id));
    let tick = 0;

    const timer = setInterval(() => {
      tick += 1;
      handlers.onBatch(known.map((id, index) => ({ parameterId: id, result: this.sample(id, index, tick, options) })));
      if (unknown.length > 0) {
        handlers.onError(new TransportError(`NO DATA for ${unknown.join(', ')}`));
      }
    }, options.intervalMs);
    this.streams.add(timer);

    return {
      cancel: () => {
        clearInterval(timer);
        this.streams.delete(timer);
      },
    };
  }

  async supportedParameters(): Promise<ParameterId[]> {
    return this.catalog.definitions
      .map(definition => definition.id)
      .filter(id => parseParameterId(id).kind === 'mode1');
  }

  async scanTroubleCodes(): Promise<string[]> {
    if (!this.connected) {
      throw new TransportError('Not connected to vehicle');
    }
    return [...this.troubleCodes];
  }

  onLinkLost(listener: (reason: string) => void): () => void {
    this.linkListeners.add(listener);
    return () => {
      this.linkListeners.delete(listener);
    };
  }

  /** Drops the connection as if the adapter went away. */
  simulateLinkLoss(reason = 'Adapter stopped responding'): void {
    if (!this.connected) return;
    this.close();
    this.linkListeners.forEach(listener => listener(reason));
  }

  private sample(id: ParameterId, index: number, tick: number, options: StreamOptions): DecodedResult {
    const command = parseParameterId(id);
    const codes = this.troubleCodes;

    if (command.kind === 'mode3') {
      return { type: 'troubleCodes', codes: [...codes] };
    }
    if (command.kind === 'mode1' && command.pid === STATUS_PIDS.MIL_STATUS) {
      return { type: 'milStatus', status: { milOn: codes.length > 0, dtcCount: codes.length } };
    }
    if (command.kind === 'mode1' && command.pid === STATUS_PIDS.FUEL_SYSTEM_STATUS) {
      return { type: 'fuelStatus', status: { system1: 2, system2: 0 } };
    }

    const range = this.catalog.typicalRange(id, 'metric') ?? { min: 0, max: 100 };
    const wave = 0.5 + 0.5 * Math.sin(tick * 0.3 + index);
    const metricValue = range.min + (range.max - range.min) * wave;
    const metricUnit = this.catalog.get(id)?.units ?? '';
    const conversion = conversionFor(metricUnit, options.units);

    return {
      type: 'measurement',
      measurement: { value: conversion.convert(metricValue), unit: conversion.label },
    };
  }
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
