import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app';
import { APP_CONSTANTS } from '../src/config/constants';
import { Bridge, createBridge } from '../src/container';
import { FakeTransport, measurement } from './helpers/FakeTransport';

describe('HTTP API', () => {
  let transport: FakeTransport;
  let bridge: Bridge;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    transport = new FakeTransport();
    bridge = createBridge({ transport, querySupportedPids: false });
    app = createApp(bridge, { exposeErrors: true });
  });

  afterEach(() => {
    bridge.dispose();
  });

  it('reports health', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('creates a token and replaces its interest', async () => {
    const created = await request(app).post('/api/v1/interest/tokens');
    expect(created.status).toBe(201);
    const token: string = created.body.token;

    const res = await request(app)
      .put(`/api/v1/interest/tokens/${token}`)
      .send({ parameters: ['010d', ' 010C'] });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, token, parameters: ['010C', '010D'], interested: ['010C', '010D'] });
  });

  it('rejects bad tokens and unknown parameter ids', async () => {
    const badToken = await request(app).put('/api/v1/interest/tokens/abc').send({ parameters: ['010C'] });
    expect(badToken.status).toBe(400);
    expect(badToken.body.details).toEqual(['params.token: Invalid uuid']);

    const token = bridge.registry.makeToken();
    const badId = await request(app).put(`/api/v1/interest/tokens/${token}`).send({ parameters: ['ZZ'] });
    expect(badId.status).toBe(400);
    expect(badId.body.details).toEqual(['body.parameters.0: Unrecognized parameter id']);
  });

  it('refuses new tokens once the live token cap is reached', async () => {
    for (let i = 0; i < APP_CONSTANTS.MAX_INTEREST_TOKENS; i++) {
      bridge.registry.replace(['010C'], `held-${i}`);
    }

    const res = await request(app)
      .put(`/api/v1/interest/tokens/${bridge.registry.makeToken()}`)
      .send({ parameters: ['010D'] });

    expect(res.status).toBe(429);
    expect(res.body).toEqual({ success: false, error: 'Too many live interest tokens' });
    expect([...bridge.registry.getInterested()]).toEqual(['010C']);
  });

  it('schedules a clear', async () => {
    const token = bridge.registry.makeToken();
    bridge.registry.replace(['010C'], token);

    const res = await request(app).delete(`/api/v1/interest/tokens/${token}`);
    await bridge.queue.whenIdle();

    expect(res.status).toBe(202);
    expect(res.body).toEqual({ success: true, message: 'Interest clear scheduled' });
    expect(bridge.registry.getInterested().size).toBe(0);
  });

  it('connects and exposes published state', async () => {
    bridge.registry.replace(['010C'], bridge.registry.makeToken());

    const connect = await request(app).post('/api/v1/connection/connect');
    expect(connect.body).toEqual({ success: true, connectionState: { status: 'connected' } });

    transport.emit([measurement('010C', 1500, 'RPM')]);
    const res = await request(app).get('/api/v1/state');

    expect(res.body.state.streaming).toEqual(['010C']);
    expect(res.body.state.stats['010C']).toEqual({
      parameterId: '010C',
      latest: { value: 1500, unit: 'RPM' },
      min: 1500,
      max: 1500,
      sampleCount: 1,
    });

    const disconnect = await request(app).post('/api/v1/connection/disconnect');
    expect(disconnect.body.connectionState).toEqual({ status: 'disconnected' });
  });

  it('returns 404 when resetting a parameter without statistics', async () => {
    const res = await request(app).post('/api/v1/stats/reset').send({ parameterId: '010D' });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'No statistics recorded for 010D' });
  });

  it('resets every parameter when no id is given', async () => {
    const res = await request(app).post('/api/v1/stats/reset');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, stats: {} });
  });

  it('switches units and reflects them in the catalog', async () => {
    const units = await request(app).put('/api/v1/settings/units').send({ units: 'imperial' });
    expect(units.body).toEqual({ success: true, units: 'imperial' });

    const catalog = await request(app).get('/api/v1/catalog');
    const coolant = catalog.body.pids.find((pid: { id: string }) => pid.id === '0105');
    expect(coolant).toEqual({
      id: '0105',
      label: 'Coolant',
      name: 'Engine coolant temperature',
      kind: 'gauge',
      enabled: true,
      unitLabel: '°F',
      typicalRange: { min: 176, max: 221 },
      gaugeRange: { min: 176, max: 266 },
    });
  });

  it('rejects an unknown unit system', async () => {
    const res = await request(app).put('/api/v1/settings/units').send({ units: 'nautical' });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Validation failed');
  });

  it('toggles catalog entries', async () => {
    const res = await request(app).patch('/api/v1/catalog/0111').send({ enabled: true });
    expect(res.body).toEqual({ success: true, parameterId: '0111', enabled: true });
    expect(bridge.selection.enabledGauges().map(definition => definition.id)).toContain('0111');

    const missing = await request(app).patch('/api/v1/catalog/0199').send({ enabled: true });
    expect(missing.status).toBe(404);
    expect(missing.body.error).toBe('Unknown catalog parameter 0199');
  });

  it('serves the session log as text', async () => {
    const res = await request(app).get('/api/v1/debug/log');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/plain/);
    expect(res.text.split('\n')[0]).toBe('=== OBD Live Bridge Session Log ===');
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/api/v1/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'Route not found: GET /api/v1/nope' });
  });
});
