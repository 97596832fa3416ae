import fastifyStatic from '@fastify/static';
import { FastifyBaseLogger, FastifyInstance, fastify } from 'fastify';
import * as fs from 'fs/promises';
import * as http from 'http';
import * as https from 'https';
import * as path from 'path';
import pino from 'pino';
import { IMediaServer, ServerError, ShutdownError } from '@vmboot/core';
import { MediaServerOptions } from './types';

/** Served prefix; image URLs are built from the same constant. */
export const IMAGES_PATH_PREFIX = '/images/';

export const DEFAULT_GRACE_MS = 10_000;

export function buildImageUrl(baseURL: string, fileName: string): string {
  const base = baseURL.replace(/\/+$/, '');
  return `${base}${path.posix.join(IMAGES_PATH_PREFIX, encodeURIComponent(fileName))}`;
}

/**
 * Read-only HTTP(S) server for the image directory. Each instance owns its
 * own fastify instance and route table.
 */
export class MediaServer implements IMediaServer {
  private app: FastifyInstance | null = null;
  private logger: FastifyBaseLogger;
  private listeningURL: string | undefined;

  constructor(private options: MediaServerOptions) {
    this.logger = options.logger ?? pino({ name: 'media-server' });
  }

  get url(): string | undefined {
    return this.listeningURL;
  }

  get secure(): boolean {
    return this.options.tls !== undefined;
  }

  async start(): Promise<string> {
    if (this.listeningURL) return this.listeningURL;

    const app = this.createApp(await this.readTlsFiles());
    this.app = app;

    await app.register(fastifyStatic, {
      root: path.resolve(this.options.rootDir),
      prefix: IMAGES_PATH_PREFIX,
      index: false,
      list: false,
      decorateReply: false,
    });
    app.get('/health', async () => ({ status: 'ok' }));

    try {
      await app.listen({ port: this.options.port, host: this.options.host });
    } catch (error) {
      this.app = null;
      throw new ServerError(`cannot listen on ${this.options.host}:${this.options.port}`, { cause: error });
    }

    const address = app.server.address();
    if (address === null || typeof address === 'string') {
      throw new ServerError(`unexpected listen address for ${this.options.host}:${this.options.port}`);
    }

    const scheme = this.secure ? 'https' : 'http';
    this.listeningURL = `${scheme}://${displayHost(this.options.host)}:${address.port}`;
    this.logger.info({ url: this.listeningURL, root: this.options.rootDir }, `Serving images over ${scheme}`);
    return this.listeningURL;
  }

  /**
   * Stops accepting connections and waits up to `graceMs` for in-flight
   * requests. When the grace period elapses or the graceful close fails,
   * every remaining connection is closed; only a failure of that forced
   * close is a `ShutdownError`.
   */
  async stop(graceMs: number = DEFAULT_GRACE_MS): Promise<void> {
    const app = this.app;
    if (!app) return;
    this.app = null;
    this.listeningURL = undefined;

    const closing = this.closeGracefully(app).then(
      () => 'closed' as const,
      (error: unknown) => {
        this.logger.warn({ err: error }, 'Graceful close failed, forcing close');
        return 'failed' as const;
      }
    );
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), graceMs);
    });

    const outcome = await Promise.race([closing, timedOut]);
    clearTimeout(timer);
    if (outcome === 'closed') {
      this.logger.info('Media server stopped');
      return;
    }
    if (outcome === 'timeout') {
      this.logger.warn({ graceMs }, 'Grace period elapsed, closing remaining connections');
    }

    try {
      app.server.closeAllConnections();
      if (outcome === 'timeout' && (await closing) === 'closed') {
        this.logger.info('Media server closed');
        return;
      }
      await closeListener(app.server);
    } catch (error) {
      throw new ShutdownError('media server did not close', { cause: error });
    }
    this.logger.info('Media server closed');
  }

  protected closeGracefully(app: FastifyInstance): Promise<void> {
    return app.close();
  }

  private async readTlsFiles(): Promise<{ key: Buffer; cert: Buffer } | undefined> {
    const tls = this.options.tls;
    if (!tls) return undefined;

    try {
      const [key, cert] = await Promise.all([fs.readFile(tls.keyFile), fs.readFile(tls.certFile)]);
      return { key, cert };
    } catch (error) {
      throw new ServerError('cannot read TLS key or certificate', { cause: error });
    }
  }

  // Not async: a fastify instance is thenable and awaiting it boots it.
  protected createApp(tls: { key: Buffer; cert: Buffer } | undefined): FastifyInstance {
    if (!tls) {
      return fastify({ logger: this.logger, forceCloseConnections: false });
    }

    return fastify<http.Server>({
      logger: this.logger,
      forceCloseConnections: false,
      serverFactory: (handler) => https.createServer(tls, handler),
    });
  }
}

function closeListener(server: http.Server): Promise<void> {
  if (!server.listening) return Promise.resolve();
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

function displayHost(host: string): string {
  return host === '0.0.0.0' || host === '::' ? 'localhost' : host;
}
