import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import request from 'supertest';
import { defaultConfig } from '../../models/config.model';
import { type TestApp, createTestApp } from './test-app';

describe('upload and file routes', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await createTestApp();
  });

  afterEach(async () => {
    await t.cleanup();
  });

  it('should list no files at first', async () => {
    const res = await request(t.app).get('/api/files');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ files: [] });
  });

  it('should store an upload under its sanitized name', async () => {
    const res = await request(t.app)
      .post('/upload')
      .set('Accept', 'application/json')
      .attach('file', Buffer.from('%PDF-1.4 test'), 'My Report.pdf');

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ ok: true, name: 'My_Report.pdf' });

    const list = await request(t.app).get('/api/files');
    expect(list.body.files).toHaveLength(1);
    expect(list.body.files[0]).toMatchObject({ name: 'My_Report.pdf', size: 13, size_h: '13 B' });
  });

  it('should redirect browsers back to the dashboard', async () => {
    const res = await request(t.app).post('/upload').attach('file', Buffer.from('%PDF-1.4 test'), 'a.pdf');
    expect(res.status).toBe(303);
    expect(res.headers.location).toBe('/');
  });

  it('should reject unsupported file types', async () => {
    const res = await request(t.app)
      .post('/upload')
      .set('Accept', 'application/json')
      .attach('file', Buffer.from('hello'), 'notes.txt');

    expect(res.status).toBe(415);
    expect(res.body).toEqual({ ok: false, error: 'Unsupported file type. Use PDF or common image formats.' });
    await expect(fs.readdir(t.uploadTempDir)).resolves.toEqual([]);
    await expect(fs.readdir(t.uploadsDir)).resolves.toEqual([]);
  });

  it('should require a file part', async () => {
    const res = await request(t.app).post('/upload').field('comment', 'no file');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: 'No file provided' });
  });

  it('should enforce the configured size limit', async () => {
    await t.configStore.update((current) => ({ ...current, app: { max_upload_mb: 1 } }));

    const res = await request(t.app)
      .post('/upload')
      .attach('file', Buffer.alloc(1024 * 1024 + 1), 'big.pdf');

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ ok: false, error: 'File too large' });
  });

  it('should download an upload as an attachment', async () => {
    await fs.writeFile(path.join(t.uploadsDir, 'scan.png'), 'png-bytes');

    const res = await request(t.app).get('/uploads/scan.png');
    expect(res.status).toBe(200);
    expect(res.headers['content-disposition']).toBe('attachment; filename="scan.png"');
  });

  it('should answer 404 for a missing download', async () => {
    const res = await request(t.app).get('/uploads/missing.pdf');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ ok: false, error: 'File not found' });
  });

  it('should delete an upload', async () => {
    await fs.writeFile(path.join(t.uploadsDir, 'old.pdf'), 'x');

    const res = await request(t.app).delete('/api/files/old.pdf');
    expect(res.body).toEqual({ ok: true });
    await expect(fs.readdir(t.uploadsDir)).resolves.toEqual([]);

    const again = await request(t.app).delete('/api/files/old.pdf');
    expect(again.status).toBe(404);
  });

  it('should keep deletes behind the token when one is required', async () => {
    const config = defaultConfig();
    config.security = { require_token: true, token: 'test-secret' };
    const locked = await createTestApp({ config });
    await fs.writeFile(path.join(locked.uploadsDir, 'old.pdf'), 'x');

    const denied = await request(locked.app).delete('/api/files/old.pdf');
    expect(denied.status).toBe(401);
    const allowed = await request(locked.app).delete('/api/files/old.pdf').set('X-PrinterPal-Token', 'test-secret');
    expect(allowed.body).toEqual({ ok: true });

    await locked.cleanup();
  });
});
