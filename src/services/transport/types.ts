// Contract of the vehicle transport the core drives

import { ParameterId } from '../../models/Parameter';
import { FuelSystemStatus, Measurement, MilStatus, UnitSystem } from '../../models/Measurement';

export type DecodedResult =
  | { type: 'measurement'; measurement: Measurement }
  | { type: 'milStatus'; status: MilStatus }
  | { type: 'fuelStatus'; status: FuelSystemStatus }
  | { type: 'troubleCodes'; codes: string[] };

export interface StreamItem {
  parameterId: ParameterId;
  result: DecodedResult;
}

export interface StreamHandlers {
  onBatch: (items: StreamItem[]) => void;
  // Decode or read error for part of a cycle; the stream keeps running
  onError: (error: Error) => void;
  // The transport ended the stream on its own, optionally because of an error
  onClose: (error?: Error) => void;
}

export interface StreamOptions {
  intervalMs: number;
  units: UnitSystem;
}

export interface StreamSubscription {
  cancel(): void;
}

export interface VehicleTransport {
  readonly peripheralName: string | null;

  /** One-shot handshake. Rejects with a `TransportError` describing the failure. */
  open(): Promise<void>;

  /** Tears down any live connection and stream. Idempotent. */
  close(): void;

  subscribe(parameterIds: ParameterId[], handlers: StreamHandlers, options: StreamOptions): StreamSubscription;

  /** Mode 01 parameter ids the vehicle reports as supported. */
  supportedParameters(): Promise<ParameterId[]>;

  scanTroubleCodes(): Promise<string[]>;

  /** Notified when an open connection drops without a `close()` call. */
  onLinkLost(listener: (reason: string) => void): () => void;
}

export class TransportError extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(reason);
    this.name = 'TransportError';
    this.reason = reason;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export function reasonOf(error: unknown): string {
  if (error instanceof TransportError) return error.reason;
  if (error instanceof Error) return error.message;
  return String(error);
}
