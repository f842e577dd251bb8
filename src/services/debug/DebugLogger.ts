// Session event log for the live-data bridge
// Records lifecycle transitions and stream subscription churn with timestamps

import { APP_CONSTANTS } from '../../config/constants';

export enum EventKind {
  TRANSITION = 'TRANSITION',
  SUBSCRIBE = 'SUBSCRIBE',
  CANCEL = 'CANCEL',
  EVENT = 'EVENT',
  ERROR = 'ERROR',
}

export interface DebugLogEntry {
  timestamp: number; // milliseconds since epoch
  kind: EventKind;
  message: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

export class DebugLogger {
  private logs: DebugLogEntry[] = [];
  private sessionStartTime = 0;

  constructor(
    private readonly maxLogs: number = APP_CONSTANTS.DEBUG_LOG_MAX_ENTRIES,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Start a session. Existing entries are kept so the events leading up to a
   * connect stay visible.
   */
  startSession(): void {
    if (this.sessionStartTime === 0) {
      this.sessionStartTime = this.now();
    }
    this.logEvent('Session started');
  }

  logTransition(from: string, to: string): void {
    this.addLog({ kind: EventKind.TRANSITION, message: `${from} -> ${to}`, metadata: { from, to } });
  }

  logSubscribe(parameterIds: readonly string[]): void {
    this.addLog({
      kind: EventKind.SUBSCRIBE,
      message: `Subscribed to ${parameterIds.length} parameters`,
      metadata: { parameterIds: [...parameterIds] },
    });
  }

  logCancel(parameterIds: readonly string[]): void {
    this.addLog({
      kind: EventKind.CANCEL,
      message: `Cancelled subscription for ${parameterIds.length} parameters`,
      metadata: { parameterIds: [...parameterIds] },
    });
  }

  logEvent(message: string, metadata?: Record<string, unknown>): void {
    this.addLog({ kind: EventKind.EVENT, message, metadata });
  }

  logError(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.addLog({
      kind: EventKind.ERROR,
      message,
      error: error === undefined ? undefined : error instanceof Error ? error.message : String(error),
      metadata,
    });
  }

  getLogs(kind?: EventKind): DebugLogEntry[] {
    return kind ? this.logs.filter(log => log.kind === kind) : [...this.logs];
  }

  getSessionDuration(): number {
    return this.sessionStartTime > 0 ? this.now() - this.sessionStartTime : 0;
  }

  clearLogs(): void {
    this.logs = [];
    this.sessionStartTime = 0;
  }

  exportLogsAsText(): string {
    const lines: string[] = [];
    lines.push('=== OBD Live Bridge Session Log ===');
    lines.push(`Session Start: ${this.sessionStartTime > 0 ? new Date(this.sessionStartTime).toISOString() : 'n/a'}`);
    lines.push(`Duration: ${this.getSessionDuration()}ms`);
    lines.push(`Total Entries: ${this.logs.length}`);
    lines.push('');

    for (const log of this.logs) {
      const relativeTime = this.sessionStartTime > 0 ? log.timestamp - this.sessionStartTime : 0;
      lines.push(`[+${relativeTime}ms] [${log.kind}] ${log.message}`);
      if (log.error) {
        lines.push(`  Error: ${log.error}`);
      }
      if (log.metadata) {
        lines.push(`  Meta: ${JSON.stringify(log.metadata)}`);
      }
    }

    return lines.join('\n');
  }

  private addLog(entry: Omit<DebugLogEntry, 'timestamp'>): void {
    this.logs.push({ timestamp: this.now(), ...entry });
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }
}
