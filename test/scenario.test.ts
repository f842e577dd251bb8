import { describe, expect, it } from 'vitest';
import { createBridge } from '../src/container';
import { FakeTransport, measurement } from './helpers/FakeTransport';

const RPM = '010C';
const SPEED = '010D';

describe('live data end to end', () => {
  it('streams rpm, then adds speed with a single restart', async () => {
    const transport = new FakeTransport();
    const bridge = createBridge({ transport });
    const stats = () => bridge.store.getState().stats;

    const t1 = bridge.registry.makeToken();
    bridge.registry.replace([RPM], t1);
    await bridge.lifecycle.connect();
    expect(transport.latest?.parameterIds).toEqual([RPM]);

    transport.emit([measurement(RPM, 1500, 'RPM')]);
    expect(stats()[RPM]).toEqual({
      parameterId: RPM,
      latest: { value: 1500, unit: 'RPM' },
      min: 1500,
      max: 1500,
      sampleCount: 1,
    });

    transport.emit([measurement(RPM, 1800, 'RPM')]);
    expect(stats()[RPM]).toEqual({
      parameterId: RPM,
      latest: { value: 1800, unit: 'RPM' },
      min: 1500,
      max: 1800,
      sampleCount: 2,
    });

    const t2 = bridge.registry.makeToken();
    bridge.registry.replace([SPEED], t2);
    expect([...bridge.registry.getInterested()].sort()).toEqual([RPM, SPEED]);
    expect(transport.log).toEqual(['open', 'subscribe:010C', 'cancel:010C', 'subscribe:010C,010D']);

    const rpmBefore = stats()[RPM];
    transport.emit([measurement(SPEED, 60, 'km/h')]);
    expect(stats()[SPEED]).toEqual({
      parameterId: SPEED,
      latest: { value: 60, unit: 'km/h' },
      min: 60,
      max: 60,
      sampleCount: 1,
    });
    expect(stats()[RPM]).toEqual(rpmBefore);

    bridge.dispose();
  });
});
