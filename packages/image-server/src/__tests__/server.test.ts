/**
 * MediaServer tests
 *
 * Plain HTTP and TLS servers on ephemeral ports; TLS material is generated
 * per run.
 */

import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import axios from 'axios';
import type { FastifyInstance } from 'fastify';
import * as fs from 'fs/promises';
import * as http from 'http';
import * as https from 'https';
import * as path from 'path';
import selfsigned from 'selfsigned';
import { ServerError, ShutdownError } from '@vmboot/core';
import { createTempDir, removeTempDir, silentLogger } from '@vmboot/test-utils';
import { buildImageUrl, IMAGES_PATH_PREFIX, MediaServer } from '../server';
import type { MediaServerOptions } from '../types';

const IMAGE = Buffer.from('not really an iso, but served byte for byte');

/** Exposes the fastify instance and lets a test add routes or fail the graceful close. */
class InstrumentedMediaServer extends MediaServer {
  private instance: FastifyInstance | undefined;

  constructor(
    options: MediaServerOptions,
    private hooks: { routes?: (app: FastifyInstance) => void; closeError?: Error } = {}
  ) {
    super(options);
  }

  get fastifyInstance(): FastifyInstance {
    if (!this.instance) throw new Error('server not started');
    return this.instance;
  }

  protected createApp(tls: { key: Buffer; cert: Buffer } | undefined): FastifyInstance {
    const app = super.createApp(tls);
    this.hooks.routes?.(app);
    this.instance = app;
    return app;
  }

  protected closeGracefully(app: FastifyInstance): Promise<void> {
    const closeError = this.hooks.closeError;
    return closeError ? Promise.reject(closeError) : super.closeGracefully(app);
  }
}

describe('buildImageUrl', () => {
  it('should place the image under the served prefix', () => {
    expect(IMAGES_PATH_PREFIX).toBe('/images/');
    expect(buildImageUrl('http://media.test:8080', 'test-config.iso')).toBe(
      'http://media.test:8080/images/test-config.iso'
    );
  });

  it('should tolerate a trailing slash and keep a base path', () => {
    expect(buildImageUrl('http://media.test:8080/', 'test-config.iso')).toBe(
      'http://media.test:8080/images/test-config.iso'
    );
    expect(buildImageUrl('https://cdn.test/boot', 'test-config.iso')).toBe(
      'https://cdn.test/boot/images/test-config.iso'
    );
  });

  it('should encode the file name', () => {
    expect(buildImageUrl('http://media.test', 'my image.iso')).toBe('http://media.test/images/my%20image.iso');
  });
});

describe('MediaServer', () => {
  let tempDir: string;
  let rootDir: string;
  const servers: MediaServer[] = [];

  function createServer(options: Partial<ConstructorParameters<typeof MediaServer>[0]> = {}): MediaServer {
    const server = new MediaServer({ rootDir, host: '127.0.0.1', port: 0, logger: silentLogger, ...options });
    servers.push(server);
    return server;
  }

  beforeAll(async () => {
    tempDir = await createTempDir('media-server');
    rootDir = path.join(tempDir, 'isos');
    await fs.mkdir(rootDir);
    await fs.writeFile(path.join(rootDir, 'test-config.iso'), IMAGE);
  });

  afterEach(async () => {
    for (const server of servers.splice(0)) {
      await server.stop(100);
    }
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  describe('plain HTTP', () => {
    it('should serve the image under the images prefix', async () => {
      const server = createServer();
      const url = await server.start();

      const response = await axios.get<ArrayBuffer>(`${url}/images/test-config.iso`, { responseType: 'arraybuffer' });

      expect(url).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
      expect(server.url).toBe(url);
      expect(response.status).toBe(200);
      expect(Buffer.from(response.data).equals(IMAGE)).toBe(true);
    });

    it('should answer HEAD and range requests', async () => {
      const url = await createServer().start();

      const head = await axios.head(`${url}/images/test-config.iso`);
      const range = await axios.get<string>(`${url}/images/test-config.iso`, {
        headers: { Range: 'bytes=0-2' },
        responseType: 'text',
      });

      expect(head.status).toBe(200);
      expect(head.headers['content-length']).toBe(String(IMAGE.length));
      expect(range.status).toBe(206);
      expect(range.data).toBe('not');
    });

    it('should return 404 for missing files and other methods', async () => {
      const url = await createServer().start();

      const missing = await axios.get(`${url}/images/missing.iso`, { validateStatus: () => true });
      const post = await axios.post(`${url}/images/test-config.iso`, {}, { validateStatus: () => true });

      expect(missing.status).toBe(404);
      expect(post.status).toBe(404);
    });

    it('should not list the image directory', async () => {
      const url = await createServer().start();

      const listing = await axios.get<string>(`${url}/images/`, { validateStatus: () => true, responseType: 'text' });

      expect(listing.status).toBeGreaterThanOrEqual(400);
      expect(listing.data).not.toContain('test-config.iso');
    });

    it('should report health', async () => {
      const url = await createServer().start();

      const response = await axios.get(`${url}/health`);

      expect(response.data).toEqual({ status: 'ok' });
    });

    it('should fail with ServerError when the port is taken', async () => {
      const first = createServer();
      const url = await first.start();
      const port = Number(new URL(url).port);

      await expect(createServer({ port }).start()).rejects.toBeInstanceOf(ServerError);
    });

    it('should stop accepting connections on stop', async () => {
      const server = createServer();
      const url = await server.start();
      const agent = new http.Agent({ keepAlive: true });
      await axios.get(`${url}/health`, { httpAgent: agent });

      await server.stop(100);

      expect(server.url).toBeUndefined();
      await expect(axios.get(`${url}/health`)).rejects.toThrow();
      agent.destroy();
    });
  });

  describe('shutdown', () => {
    function createInstrumented(hooks: ConstructorParameters<typeof InstrumentedMediaServer>[1]) {
      const server = new InstrumentedMediaServer({ rootDir, host: '127.0.0.1', port: 0, logger: silentLogger }, hooks);
      servers.push(server);
      return server;
    }

    it('should drop in-flight requests once the grace period elapses', async () => {
      let arrived: () => void = () => {};
      const requestArrived = new Promise<void>((resolve) => {
        arrived = resolve;
      });
      const server = createInstrumented({
        routes: (app) => {
          app.get('/slow', () => {
            arrived();
            return new Promise<never>(() => {});
          });
        },
      });
      const url = await server.start();
      const forced = vi.spyOn(server.fastifyInstance.server, 'closeAllConnections');

      const pending = axios.get(`${url}/slow`).then(
        () => 'answered',
        () => 'dropped'
      );
      await requestArrived;
      await server.stop(50);

      expect(forced).toHaveBeenCalledTimes(1);
      expect(await pending).toBe('dropped');
      expect(server.fastifyInstance.server.listening).toBe(false);
    });

    it('should force the close when the graceful close fails', async () => {
      const server = createInstrumented({ closeError: new Error('close hook failed') });
      const url = await server.start();
      const forced = vi.spyOn(server.fastifyInstance.server, 'closeAllConnections');

      await server.stop(5000);

      expect(forced).toHaveBeenCalledTimes(1);
      expect(server.fastifyInstance.server.listening).toBe(false);
      await expect(axios.get(`${url}/health`)).rejects.toThrow();
    });

    it('should fail with ShutdownError only when the forced close fails', async () => {
      const server = createInstrumented({ closeError: new Error('close hook failed') });
      await server.start();
      const listener = server.fastifyInstance.server;
      const forced = vi.spyOn(listener, 'closeAllConnections').mockImplementation(() => {
        throw new Error('sockets stuck');
      });

      const error = await server.stop(5000).then(
        () => undefined,
        (reason: unknown) => reason
      );

      expect(error).toBeInstanceOf(ShutdownError);
      expect(forced).toHaveBeenCalledTimes(1);
      forced.mockRestore();
      await new Promise<void>((resolve) => listener.close(() => resolve()));
    });
  });

  describe('TLS', () => {
    let tls: { keyFile: string; certFile: string };

    beforeAll(async () => {
      const pems = selfsigned.generate([{ name: 'commonName', value: 'localhost' }], { days: 1, keySize: 2048 });
      tls = { keyFile: path.join(tempDir, 'key.pem'), certFile: path.join(tempDir, 'cert.pem') };
      await fs.writeFile(tls.keyFile, pems.private);
      await fs.writeFile(tls.certFile, pems.cert);
    });

    it('should serve the image over HTTPS', async () => {
      const server = createServer({ tls });
      const url = await server.start();

      const response = await axios.get<ArrayBuffer>(`${url}/images/test-config.iso`, {
        responseType: 'arraybuffer',
        httpsAgent: new https.Agent({ rejectUnauthorized: false }),
      });

      expect(url).toMatch(/^https:\/\/127\.0\.0\.1:\d+$/);
      expect(server.secure).toBe(true);
      expect(Buffer.from(response.data).equals(IMAGE)).toBe(true);
    });

    it('should reject plain HTTP on the TLS port', async () => {
      const url = await createServer({ tls }).start();

      await expect(axios.get(`${url.replace(/^https:/, 'http:')}/health`, { timeout: 5000 })).rejects.toThrow();
    });

    it('should fail with ServerError when the TLS files are unreadable', async () => {
      const server = createServer({ tls: { keyFile: path.join(tempDir, 'nope.pem'), certFile: tls.certFile } });

      await expect(server.start()).rejects.toBeInstanceOf(ServerError);
    });
  });
});
