import fs from 'fs/promises';
import http from 'http';
import os from 'os';
import path from 'path';
import request from 'supertest';
import type { Express } from 'express';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DownloadCatalog, UploadSessionRegistry, createApp, describeDownloadFile } from './index';

const BOUNDARY = 'qrdrop-test-boundary';

/** Hand-built multipart body, so the test controls the filename exactly */
function multipartBody(parts: Array<{ name: string; filename?: string; content: string }>): string {
  const sections = parts.map(({ name, filename, content }) => {
    const disposition = filename
      ? `form-data; name="${name}"; filename="${filename}"\r\nContent-Type: application/octet-stream`
      : `form-data; name="${name}"`;
    return `--${BOUNDARY}\r\nContent-Disposition: ${disposition}\r\n\r\n${content}\r\n`;
  });
  return `${sections.join('')}--${BOUNDARY}--\r\n`;
}

/** Opening of a "file" part whose content and closing boundary the test writes itself */
function filePartHead(filename: string): string {
  return `--${BOUNDARY}\r\nContent-Disposition: form-data; name="file"; filename="${filename}"\r\nContent-Type: application/octet-stream\r\n\r\n`;
}

async function listenOnLoopback(handler: Express): Promise<{ server: http.Server; port: number }> {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  return { server, port: typeof address === 'object' && address ? address.port : 0 };
}

/** POST with chunked transfer encoding, so the server sees no Content-Length */
function postChunked(port: number, target: string, body: string): Promise<{ status: number; body: unknown }> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: '127.0.0.1',
        port,
        method: 'POST',
        path: target,
        headers: { 'Content-Type': `multipart/form-data; boundary=${BOUNDARY}` },
      },
      (res) => {
        let text = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          text += chunk;
        });
        res.on('end', () => resolve({ status: res.statusCode ?? 0, body: JSON.parse(text) }));
      },
    );
    req.on('error', reject);
    req.write(body);
    req.end();
  });
}

describe('transfer routes', () => {
  let uploadDir: string;
  let shareDir: string;
  let catalog: DownloadCatalog;
  let registry: UploadSessionRegistry;
  let app: Express;

  beforeEach(async () => {
    uploadDir = await fs.mkdtemp(path.join(os.tmpdir(), 'qrdrop-uploads-'));
    shareDir = await fs.mkdtemp(path.join(os.tmpdir(), 'qrdrop-share-'));
    catalog = new DownloadCatalog();
    registry = new UploadSessionRegistry();
    app = createApp({ catalog, registry, config: { uploadDir, maxUploadBytes: 1024 * 1024 } });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(uploadDir, { recursive: true, force: true });
    await fs.rm(shareDir, { recursive: true, force: true });
  });

  async function share(name: string, content: string): Promise<void> {
    const filePath = path.join(shareDir, name);
    await fs.writeFile(filePath, content);
    catalog.add(await describeDownloadFile(filePath));
  }

  describe('GET /', () => {
    it('serves the upload page', async () => {
      const res = await request(app).get('/');
      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(res.text).toContain('<h1>Upload files</h1>');
      expect(res.text).toContain("'/upload?uploadId=' + uploadId");
      expect(res.text).toContain("document.getElementById('saved-text-' + index).textContent =");
    });
  });

  describe('GET /download-page', () => {
    it('renders an explicit empty state', async () => {
      const res = await request(app).get('/download-page');
      expect(res.status).toBe(200);
      expect(res.text).toContain('<div class="empty-tip">No files available for download</div>');
      expect(res.text).not.toContain('class="file-list-item"');
    });

    it('lists catalog files with escaped names and encoded links', async () => {
      await share('a<b>.txt', 'x'.repeat(2000));
      const res = await request(app).get('/download-page');

      expect(res.text).toContain('<div class="col-name">a&lt;b&gt;.txt</div>');
      expect(res.text).toContain('<div class="col-size">2</div>');
      expect(res.text).toContain('href="/download?file=a%3Cb%3E.txt"');
      expect(res.text).not.toContain('empty-tip">');
    });
  });

  describe('POST /upload', () => {
    it('saves the file and ends the session', async () => {
      const res = await request(app)
        .post('/upload?uploadId=u1&size=11')
        .attach('file', Buffer.from('hello world'), 'notes.txt');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok', filename: 'notes.txt', uploadedBytes: 11 });
      await expect(fs.readFile(path.join(uploadDir, 'notes.txt'), 'utf8')).resolves.toBe('hello world');
      expect(registry.size).toBe(0);

      const progress = await request(app).get('/progress?uploadId=u1');
      expect(progress.body).toEqual({ total: 0, uploaded: 0 });
    });

    it('accepts a zero-byte file', async () => {
      const res = await request(app)
        .post('/upload?uploadId=empty&size=0')
        .attach('file', Buffer.alloc(0), 'empty.bin');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok', filename: 'empty.bin', uploadedBytes: 0 });
      const stats = await fs.stat(path.join(uploadDir, 'empty.bin'));
      expect(stats.size).toBe(0);
      expect(registry.size).toBe(0);
    });

    it('writes only the basename of a client-supplied path', async () => {
      const res = await request(app)
        .post('/upload?uploadId=u2&size=4')
        .set('Content-Type', `multipart/form-data; boundary=${BOUNDARY}`)
        .send(multipartBody([{ name: 'file', filename: '../../evil.txt', content: 'evil' }]));

      expect(res.status).toBe(200);
      expect(res.body.filename).toBe('evil.txt');
      await expect(fs.readFile(path.join(uploadDir, 'evil.txt'), 'utf8')).resolves.toBe('evil');
    });

    it('ignores other fields', async () => {
      const res = await request(app)
        .post('/upload?uploadId=u3&size=3')
        .set('Content-Type', `multipart/form-data; boundary=${BOUNDARY}`)
        .send(
          multipartBody([
            { name: 'note', content: 'from my phone' },
            { name: 'file', filename: 'abc.txt', content: 'abc' },
          ]),
        );

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok', filename: 'abc.txt', uploadedBytes: 3 });
    });

    it('skips other file inputs sent ahead of the file field', async () => {
      const res = await request(app)
        .post('/upload?uploadId=u9&size=5')
        .set('Content-Type', `multipart/form-data; boundary=${BOUNDARY}`)
        .send(
          multipartBody([
            { name: 'thumb', filename: 'thumb.png', content: 'not-an-image' },
            { name: 'file', filename: 'real.txt', content: 'hello' },
          ]),
        );

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok', filename: 'real.txt', uploadedBytes: 5 });
      await expect(fs.readdir(uploadDir)).resolves.toEqual(['real.txt']);
    });

    it('requires an uploadId', async () => {
      const res = await request(app).post('/upload').attach('file', Buffer.from('x'), 'x.txt');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Missing uploadId parameter' });
    });

    it('rejects a malformed size parameter', async () => {
      const res = await request(app).post('/upload?uploadId=u4&size=big').attach('file', Buffer.from('x'), 'x.txt');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Invalid size parameter: big' });
      expect(registry.size).toBe(0);
    });

    it('rejects an uploadId that is already uploading', async () => {
      registry.begin('busy', 100);
      const res = await request(app).post('/upload?uploadId=busy&size=1').attach('file', Buffer.from('x'), 'x.txt');

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ error: 'Upload already in progress for uploadId busy' });
      expect(registry.snapshot('busy')).toEqual({ total: 100, uploaded: 0 });
    });

    it('rejects a declared size above the limit', async () => {
      const small = createApp({ catalog, registry, config: { uploadDir, maxUploadBytes: 8 } });
      const res = await request(small).post('/upload?uploadId=big&size=64').attach('file', Buffer.alloc(64), 'big.bin');

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: 'Upload exceeds the 8 byte limit' });
      expect(registry.size).toBe(0);
    });

    it('rejects a body without a file field', async () => {
      const res = await request(app)
        .post('/upload?uploadId=u5&size=3')
        .set('Content-Type', `multipart/form-data; boundary=${BOUNDARY}`)
        .send(multipartBody([{ name: 'note', content: 'abc' }]));

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Missing "file" field in multipart body' });
      expect(registry.size).toBe(0);
    });

    it('rejects a body that is not multipart', async () => {
      const res = await request(app).post('/upload?uploadId=u6&size=3').set('Content-Type', 'text/plain').send('abc');

      expect(res.status).toBe(400);
      expect(registry.size).toBe(0);
    });

    it('answers 500 and releases the session when the file cannot be written', async () => {
      const broken = createApp({
        catalog,
        registry,
        config: { uploadDir: path.join(uploadDir, 'missing'), maxUploadBytes: 1024 },
      });
      const res = await request(broken).post('/upload?uploadId=u7&size=5').attach('file', Buffer.from('hello'), 'a.txt');

      expect(res.status).toBe(500);
      expect(res.body.error).toContain('ENOENT');
      expect(registry.size).toBe(0);
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it('only accepts POST', async () => {
      const res = await request(app).get('/upload?uploadId=u8');
      expect(res.status).toBe(405);
      expect(res.headers.allow).toBe('POST');
    });
  });

  describe('POST /upload over a live connection', () => {
    const servers: http.Server[] = [];

    async function serve(handler: Express): Promise<number> {
      const { server, port } = await listenOnLoopback(handler);
      servers.push(server);
      return port;
    }

    afterEach(async () => {
      for (const server of servers.splice(0)) {
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
      }
    });

    it('ends the session and removes the partial file when the client disconnects', async () => {
      const port = await serve(app);
      const req = http.request({
        host: '127.0.0.1',
        port,
        method: 'POST',
        path: '/upload?uploadId=cut&size=1000',
        headers: {
          'Content-Type': `multipart/form-data; boundary=${BOUNDARY}`,
          'Content-Length': String(filePartHead('cut.bin').length + 1000 + 64),
        },
      });
      req.on('error', () => undefined);
      req.write(filePartHead('cut.bin') + 'x'.repeat(300));

      await vi.waitFor(() => {
        expect(registry.snapshot('cut')?.uploaded).toBeGreaterThan(0);
      });
      expect(registry.snapshot('cut')?.total).toBe(1000);

      req.destroy();

      await vi.waitFor(async () => {
        expect(registry.size).toBe(0);
        await expect(fs.readdir(uploadDir)).resolves.toEqual([]);
      });
    });

    it('answers 413 and deletes the file when it outgrows the limit mid-stream', async () => {
      const small = createApp({ catalog, registry, config: { uploadDir, maxUploadBytes: 16 } });
      const port = await serve(small);

      const res = await postChunked(
        port,
        '/upload?uploadId=huge&size=4',
        multipartBody([{ name: 'file', filename: 'huge.bin', content: 'x'.repeat(64) }]),
      );

      expect(res).toEqual({ status: 413, body: { error: 'Upload exceeds the 16 byte limit' } });
      expect(registry.size).toBe(0);
      await expect(fs.readdir(uploadDir)).resolves.toEqual([]);
    });

    it('answers 400 for a multipart body that stops before its closing boundary', async () => {
      const port = await serve(app);

      const res = await postChunked(port, '/upload?uploadId=short&size=3', filePartHead('short.txt') + 'abc');

      expect(res).toEqual({ status: 400, body: { error: 'Malformed multipart body: Unexpected end of form' } });
      expect(registry.size).toBe(0);
      await vi.waitFor(async () => {
        await expect(fs.readdir(uploadDir)).resolves.toEqual([]);
      });
    });
  });

  describe('GET /progress', () => {
    it('reports a session in flight', async () => {
      registry.begin('live', 100);
      registry.advance('live', 40);

      const res = await request(app).get('/progress?uploadId=live');
      expect(res.status).toBe(200);
      expect(res.headers['cache-control']).toBe('no-store');
      expect(res.body).toEqual({ total: 100, uploaded: 40 });
    });

    it('answers zero/zero for an unknown session', async () => {
      const res = await request(app).get('/progress?uploadId=nobody');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ total: 0, uploaded: 0 });
    });

    it('requires an uploadId', async () => {
      const res = await request(app).get('/progress');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Missing uploadId parameter' });
    });
  });

  describe('GET /download', () => {
    it('streams a catalog file as an attachment', async () => {
      await share('report.pdf', 'PDF-DATA');
      const res = await request(app).get('/download?file=report.pdf');

      expect(res.status).toBe(200);
      expect(res.headers['content-disposition']).toBe('attachment; filename="report.pdf"');
      expect(res.headers['content-type']).toBe('application/octet-stream');
      expect(res.headers['content-length']).toBe('8');
      expect(Buffer.isBuffer(res.body)).toBe(true);
      expect(res.body.toString()).toBe('PDF-DATA');
    });

    it('matches names case-sensitively', async () => {
      await share('report.pdf', 'PDF-DATA');
      const res = await request(app).get('/download?file=Report.pdf');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'File not found: Report.pdf' });
    });

    it('requires a file parameter', async () => {
      const res = await request(app).get('/download');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Missing file parameter' });
    });

    it('answers 500 when a catalog file has vanished from disk', async () => {
      await share('gone.txt', 'soon gone');
      await fs.rm(path.join(shareDir, 'gone.txt'));

      const res = await request(app).get('/download?file=gone.txt');
      expect(res.status).toBe(500);
      expect(res.headers['content-disposition']).toBeUndefined();
    });
  });

  describe('GET /health', () => {
    it('reports active uploads and catalog size', async () => {
      registry.begin('live', 10);
      await share('a.txt', 'a');

      const res = await request(app).get('/health');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ status: 'ok', activeUploads: 1, catalogFiles: 1 });
    });
  });
});
