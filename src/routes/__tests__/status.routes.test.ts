import { describe, it, expect, vi, afterEach } from 'vitest';
import request from 'supertest';
import { config } from '../../config';
import { defaultConfig } from '../../models/config.model';
import { fakeGateway, statusUpdate } from '../../services/__tests__/fakes';
import { type TestApp, createTestApp } from './test-app';

describe('status and system routes', () => {
  let t: TestApp;

  afterEach(async () => {
    await t.cleanup();
  });

  it('should report health with CUPS availability', async () => {
    t = await createTestApp({ gateway: fakeGateway({ isAvailable: async () => false }) });
    const res = await request(t.app).get('/healthz');
    expect(res.body).toEqual({ ok: true, cups: false, version: config.version });
  });

  it('should return the status snapshot', async () => {
    t = await createTestApp();
    const res = await request(t.app).get('/api/status');
    expect(res.status).toBe(200);
    expect(res.body).toEqual(statusUpdate().status);
  });

  it('should return printer details', async () => {
    t = await createTestApp();
    const res = await request(t.app).get('/api/printer/Office_Laser');
    expect(res.body).toEqual({ name: 'Office_Laser', detail: 'printer Office_Laser is idle.' });
  });

  it('should cancel a job', async () => {
    const cancelJob = vi.fn(async () => undefined);
    t = await createTestApp({ gateway: fakeGateway({ cancelJob }) });

    const res = await request(t.app).post('/api/jobs/Office_Laser-12/cancel');
    expect(res.body).toEqual({ ok: true });
    expect(cancelJob).toHaveBeenCalledWith('Office_Laser-12');
  });

  it('should restart the host through the root helper', async () => {
    t = await createTestApp();
    const res = await request(t.app).post('/api/restart-host');
    expect(res.body).toEqual({ ok: true, output: '' });
    expect(t.rootHelper.restartHost).toHaveBeenCalledTimes(1);
  });

  it('should return the AirPrint helper output', async () => {
    t = await createTestApp();
    const res = await request(t.app).post('/api/airprint/ensure');
    expect(res.body).toEqual({ ok: true, output: 'AirPrint ok' });
  });

  it('should report a root helper failure as 500', async () => {
    t = await createTestApp();
    vi.mocked(t.rootHelper.restartHost).mockRejectedValueOnce(new Error('Root helper not found at /usr/local/sbin/x'));
    const res = await request(t.app).post('/api/restart-host');
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ ok: false, error: 'Root helper not found at /usr/local/sbin/x' });
  });

  describe('with a token required', () => {
    function lockedConfig(token: string) {
      const locked = defaultConfig();
      locked.security = { require_token: true, token };
      return locked;
    }

    it('should reject requests without the token', async () => {
      t = await createTestApp({ config: lockedConfig('test-secret') });
      const res = await request(t.app).post('/api/restart-host');
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ ok: false, error: 'Unauthorized' });
      expect(t.rootHelper.restartHost).not.toHaveBeenCalled();
    });

    it('should accept the token as header or query parameter', async () => {
      t = await createTestApp({ config: lockedConfig('test-secret') });
      const byHeader = await request(t.app).post('/api/airprint/ensure').set('X-PrinterPal-Token', 'test-secret');
      const byQuery = await request(t.app).post('/api/airprint/ensure?token=test-secret');
      expect(byHeader.status).toBe(200);
      expect(byQuery.status).toBe(200);
    });

    it('should answer 503 when no token is configured', async () => {
      t = await createTestApp({ config: lockedConfig('  ') });
      const res = await request(t.app).post('/api/print').send({ filename: 'a.pdf' });
      expect(res.status).toBe(503);
      expect(res.body).toEqual({ ok: false, error: 'Auth token required but not configured' });
    });

    it('should leave read-only routes open', async () => {
      t = await createTestApp({ config: lockedConfig('test-secret') });
      const res = await request(t.app).get('/api/status');
      expect(res.status).toBe(200);
    });
  });
});
