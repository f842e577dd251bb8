import { beforeEach, describe, expect, it } from 'vitest';
import { DebugLogger, EventKind } from '../src/services/debug/DebugLogger';
import { StatisticsTable } from '../src/services/stats/ParameterStatistics';
import { StreamSupervisor } from '../src/services/streaming/StreamSupervisor';
import { TelemetryStore, createTelemetryStore } from '../src/store/telemetryStore';
import { FakeTransport, measurement } from './helpers/FakeTransport';

describe('StreamSupervisor', () => {
  let transport: FakeTransport;
  let store: TelemetryStore;
  let statistics: StatisticsTable;
  let events: DebugLogger;
  let supervisor: StreamSupervisor;

  beforeEach(() => {
    transport = new FakeTransport();
    store = createTelemetryStore('metric');
    statistics = new StatisticsTable(stats => store.setState({ stats }));
    events = new DebugLogger();
    supervisor = new StreamSupervisor(transport, statistics, store, events, { intervalMs: 250, units: 'metric' });
  });

  it('subscribes with the sorted parameter set and stream options', () => {
    supervisor.start(new Set(['010D', '010C']));

    expect(transport.log).toEqual(['subscribe:010C,010D']);
    expect(transport.latest?.options).toEqual({ intervalMs: 250, units: 'metric' });
    expect(store.getState().streaming).toEqual(['010C', '010D']);
    expect(store.getState().monitoring).toBe('streaming');
    expect(supervisor.isStreaming()).toBe(true);
  });

  it('cancels the old subscription before opening the replacement', () => {
    supervisor.start(new Set(['010C']));
    supervisor.restart(new Set(['010C', '010D']));

    expect(transport.log).toEqual(['subscribe:010C', 'cancel:010C', 'subscribe:010C,010D']);
    expect(transport.active).toHaveLength(1);
  });

  it('start() with a live subscription replaces it', () => {
    supervisor.start(new Set(['010C']));
    supervisor.start(new Set(['010D']));

    expect(transport.log).toEqual(['subscribe:010C', 'cancel:010C', 'subscribe:010D']);
  });

  it('reports nothing to monitor for an empty set', () => {
    supervisor.start(new Set());

    expect(transport.log).toEqual([]);
    expect(store.getState().monitoring).toBe('nothing-to-monitor');
    expect(supervisor.getActiveParameters()).toBeNull();
    expect(events.getLogs(EventKind.EVENT).map(entry => entry.message)).toEqual(['Nothing to monitor']);
  });

  it('restart with an empty set cancels and reports nothing to monitor', () => {
    supervisor.start(new Set(['010C']));
    supervisor.restart(new Set());

    expect(transport.log).toEqual(['subscribe:010C', 'cancel:010C']);
    expect(store.getState().streaming).toEqual([]);
    expect(store.getState().monitoring).toBe('nothing-to-monitor');
  });

  it('folds measurements into statistics', () => {
    supervisor.start(new Set(['010C', '221940']));

    transport.emit([measurement('010C', 900, 'RPM'), measurement('221940', 12.5, '%')]);
    transport.emit([measurement('010C', 1400, 'RPM')]);

    expect(store.getState().stats['010C']).toEqual({
      parameterId: '010C',
      latest: { value: 1400, unit: 'RPM' },
      min: 900,
      max: 1400,
      sampleCount: 2,
    });
    expect(store.getState().stats['221940'].latest).toEqual({ value: 12.5, unit: '%' });
  });

  it('routes status results to their own fields', () => {
    supervisor.start(new Set(['0101', '0103', '03']));

    transport.emit([
      { parameterId: '0101', result: { type: 'milStatus', status: { milOn: true, dtcCount: 2 } } },
      { parameterId: '0103', result: { type: 'fuelStatus', status: { system1: 2, system2: 0 } } },
      { parameterId: '03', result: { type: 'troubleCodes', codes: ['P0300', 'p0420'] } },
    ]);

    const state = store.getState();
    expect(state.milStatus).toEqual({ milOn: true, dtcCount: 2 });
    expect(state.fuelStatus).toEqual({ system1: 2, system2: 0 });
    expect(state.troubleCodes).toEqual([
      { code: 'P0300', severity: 'critical', category: 'powertrain' },
      { code: 'P0420', severity: 'warning', category: 'powertrain' },
    ]);
    expect(state.stats).toEqual({});
  });

  it('does not republish an unchanged MIL status', () => {
    supervisor.start(new Set(['0101']));
    const mil = { parameterId: '0101', result: { type: 'milStatus' as const, status: { milOn: false, dtcCount: 0 } } };
    transport.emit([mil]);
    const published = store.getState().milStatus;

    transport.emit([mil]);

    expect(store.getState().milStatus).toBe(published);
  });

  it('ignores results outside the subscription and mismatched payloads', () => {
    supervisor.start(new Set(['010C', '0101']));

    transport.emit([
      measurement('010D', 55, 'km/h'),
      measurement('0101', 1),
      { parameterId: '010C', result: { type: 'troubleCodes', codes: ['P0171'] } },
    ]);

    const state = store.getState();
    expect(state.stats).toEqual({});
    expect(state.milStatus).toBeNull();
    expect(state.troubleCodes).toBeNull();
  });

  it('drops non-finite readings so min/max keep tracking', () => {
    supervisor.start(new Set(['010C', '010D']));

    transport.emit([measurement('010C', Number.NaN, 'RPM'), measurement('010D', Number.POSITIVE_INFINITY, 'km/h')]);
    expect(store.getState().stats).toEqual({});

    transport.emit([measurement('010C', 5, 'RPM'), measurement('010C', Number.NaN, 'RPM')]);
    transport.emit([measurement('010C', 9, 'RPM')]);

    expect(store.getState().stats['010C']).toEqual({
      parameterId: '010C',
      latest: { value: 9, unit: 'RPM' },
      min: 5,
      max: 9,
      sampleCount: 2,
    });
  });

  it('ignores batches from a cancelled subscription', () => {
    supervisor.start(new Set(['010C']));
    const stale = transport.latest;
    supervisor.restart(new Set(['010C', '010D']));

    stale?.handlers.onBatch([measurement('010C', 5000, 'RPM')]);

    expect(store.getState().stats).toEqual({});
  });

  it('keeps streaming after a non-fatal error', () => {
    supervisor.start(new Set(['010C']));

    transport.latest?.handlers.onError(new Error('NO DATA'));

    expect(supervisor.isStreaming()).toBe(true);
    expect(store.getState().monitoring).toBe('streaming');
    expect(events.getLogs(EventKind.ERROR)).toMatchObject([{ message: 'Stream error', error: 'NO DATA' }]);
  });

  it('drops the handle when the transport ends the stream', () => {
    supervisor.start(new Set(['010C']));

    transport.latest?.handlers.onClose(new Error('adapter reset'));

    expect(supervisor.isStreaming()).toBe(false);
    expect(store.getState().monitoring).toBe('idle');
    expect(store.getState().streaming).toEqual([]);
    expect(transport.log).toEqual(['subscribe:010C', 'cancel:010C']);
  });

  it('stays idle when the transport refuses the subscription', () => {
    transport.throwOnSubscribe = true;

    supervisor.start(new Set(['010C']));

    expect(supervisor.isStreaming()).toBe(false);
    expect(store.getState().monitoring).toBe('idle');
    expect(events.getLogs(EventKind.ERROR)).toMatchObject([{ message: 'Subscribe failed', error: 'subscribe refused' }]);
  });

  it('passes the current units to the next subscription', () => {
    supervisor.setUnits('imperial');
    supervisor.start(new Set(['010D']));

    expect(transport.latest?.options.units).toBe('imperial');
  });

  it('stop() cancels and goes idle', () => {
    supervisor.start(new Set(['010C']));
    supervisor.stop();

    expect(transport.active).toHaveLength(0);
    expect(store.getState().monitoring).toBe('idle');
  });
});
