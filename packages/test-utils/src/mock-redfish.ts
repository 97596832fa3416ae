/**
 * In-process Redfish service for tests.
 *
 * Simulates:
 * 1. Service root and Systems collection
 * 2. Basic auth and X-Auth-Token sessions (SessionService/Sessions)
 * 3. One ComputerSystem linked to any number of Managers
 * 4. VirtualMedia collections with InsertMedia / EjectMedia actions
 * 5. ComputerSystem.Reset
 *
 * Every request is recorded in `calls` so tests can assert ordering.
 */

import fastify, { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

export interface MockVirtualMedia {
  id: string;
  mediaTypes: string[];
  inserted?: boolean;
  image?: string;
  /** Advertise InsertMedia / EjectMedia actions (default true). */
  actions?: boolean;
}

export interface MockManager {
  id: string;
  /** Omit to model a manager without a VirtualMedia collection. */
  virtualMedia?: MockVirtualMedia[];
}

export type MockFailure = 'insert' | 'eject' | 'reset' | 'listMedia';

export interface MockRedfishServerOptions {
  username?: string;
  password?: string;
  systemId?: string;
  managers?: MockManager[];
  failures?: MockFailure[];
}

export interface RecordedCall {
  method: string;
  path: string;
  body?: unknown;
}

const ROOT = '/redfish/v1';

export class MockRedfishServer {
  readonly calls: RecordedCall[] = [];
  readonly resets: string[] = [];
  private server: FastifyInstance | null = null;
  private readonly username: string;
  private readonly password: string;
  private readonly systemId: string;
  private readonly managers: MockManager[];
  private readonly failures: Set<MockFailure>;
  private readonly tokens = new Map<string, string>();
  private nextSession = 1;

  constructor(options: MockRedfishServerOptions = {}) {
    this.username = options.username ?? 'admin';
    this.password = options.password ?? 'test-secret';
    this.systemId = options.systemId ?? 'System.Embedded.1';
    this.managers = options.managers ?? [];
    this.failures = new Set(options.failures ?? []);
  }

  get systemPath(): string {
    return `${ROOT}/Systems/${this.systemId}`;
  }

  get activeSessions(): number {
    return this.tokens.size;
  }

  media(managerId: string, mediaId: string): MockVirtualMedia | undefined {
    return this.findMedia(managerId, mediaId);
  }

  /** Recorded calls that change state (everything but GET). */
  mutations(): RecordedCall[] {
    return this.calls.filter((call) => call.method !== 'GET');
  }

  async start(): Promise<string> {
    const app = fastify({ logger: false });
    this.server = app;

    app.addHook('preHandler', async (request) => {
      this.calls.push({ method: request.method, path: request.url, body: request.body ?? undefined });
    });

    app.get(`${ROOT}/`, async () => ({
      '@odata.id': `${ROOT}/`,
      Id: 'RootService',
      RedfishVersion: '1.6.0',
      Systems: { '@odata.id': `${ROOT}/Systems` },
      Managers: { '@odata.id': `${ROOT}/Managers` },
      SessionService: { '@odata.id': `${ROOT}/SessionService` },
      Links: { Sessions: { '@odata.id': `${ROOT}/SessionService/Sessions` } },
    }));

    app.post(`${ROOT}/SessionService/Sessions`, async (request, reply) => {
      const body = asRecord(request.body);
      if (body.UserName !== this.username || body.Password !== this.password) {
        return this.error(reply, 401, 'Invalid credentials');
      }
      const id = String(this.nextSession++);
      const token = `token-${id}`;
      this.tokens.set(id, token);
      return reply
        .code(201)
        .header('X-Auth-Token', token)
        .header('Location', `${ROOT}/SessionService/Sessions/${id}`)
        .send({ '@odata.id': `${ROOT}/SessionService/Sessions/${id}`, Id: id, UserName: this.username });
    });

    app.delete<{ Params: { id: string } }>(`${ROOT}/SessionService/Sessions/:id`, async (request, reply) => {
      if (!this.authorized(request)) return this.error(reply, 401, 'Unauthorized');
      this.tokens.delete(request.params.id);
      return reply.code(204).send();
    });

    app.get(`${ROOT}/Systems`, async (request, reply) => {
      if (!this.authorized(request)) return this.error(reply, 401, 'Unauthorized');
      return { Members: [{ '@odata.id': this.systemPath }] };
    });

    app.get<{ Params: { id: string } }>(`${ROOT}/Systems/:id`, async (request, reply) => {
      if (!this.authorized(request)) return this.error(reply, 401, 'Unauthorized');
      if (request.params.id !== this.systemId) return this.error(reply, 404, 'Resource not found');
      return {
        '@odata.id': this.systemPath,
        Id: this.systemId,
        Links: {
          ManagedBy: this.managers.map((manager) => ({ '@odata.id': `${ROOT}/Managers/${manager.id}` })),
        },
        Actions: {
          '#ComputerSystem.Reset': {
            target: `${this.systemPath}/Actions/ComputerSystem.Reset`,
            'ResetType@Redfish.AllowableValues': ['On', 'ForceOff', 'ForceRestart'],
          },
        },
      };
    });

    app.post<{ Params: { id: string } }>(
      `${ROOT}/Systems/:id/Actions/ComputerSystem.Reset`,
      async (request, reply) => {
        if (!this.authorized(request)) return this.error(reply, 401, 'Unauthorized');
        if (this.failures.has('reset')) return this.error(reply, 500, 'Reset action failed');
        const resetType = asRecord(request.body).ResetType;
        this.resets.push(typeof resetType === 'string' ? resetType : '');
        return reply.code(204).send();
      }
    );

    app.get<{ Params: { managerId: string } }>(`${ROOT}/Managers/:managerId`, async (request, reply) => {
      if (!this.authorized(request)) return this.error(reply, 401, 'Unauthorized');
      const manager = this.managers.find((candidate) => candidate.id === request.params.managerId);
      if (!manager) return this.error(reply, 404, 'Resource not found');
      return {
        '@odata.id': `${ROOT}/Managers/${manager.id}`,
        Id: manager.id,
        ...(manager.virtualMedia
          ? { VirtualMedia: { '@odata.id': `${ROOT}/Managers/${manager.id}/VirtualMedia` } }
          : {}),
      };
    });

    app.get<{ Params: { managerId: string } }>(
      `${ROOT}/Managers/:managerId/VirtualMedia`,
      async (request, reply) => {
        if (!this.authorized(request)) return this.error(reply, 401, 'Unauthorized');
        if (this.failures.has('listMedia')) return this.error(reply, 503, 'Service temporarily unavailable');
        const manager = this.managers.find((candidate) => candidate.id === request.params.managerId);
        if (!manager?.virtualMedia) return this.error(reply, 404, 'Resource not found');
        return {
          Members: manager.virtualMedia.map((media) => ({
            '@odata.id': this.mediaPath(manager.id, media.id),
          })),
        };
      }
    );

    app.get<{ Params: { managerId: string; mediaId: string } }>(
      `${ROOT}/Managers/:managerId/VirtualMedia/:mediaId`,
      async (request, reply) => {
        if (!this.authorized(request)) return this.error(reply, 401, 'Unauthorized');
        const { managerId, mediaId } = request.params;
        const media = this.findMedia(managerId, mediaId);
        if (!media) return this.error(reply, 404, 'Resource not found');
        const path = this.mediaPath(managerId, mediaId);
        return {
          '@odata.id': path,
          Id: media.id,
          MediaTypes: media.mediaTypes,
          Inserted: media.inserted ?? false,
          Image: media.image ?? null,
          ...(media.actions === false
            ? {}
            : {
                Actions: {
                  '#VirtualMedia.InsertMedia': { target: `${path}/Actions/VirtualMedia.InsertMedia` },
                  '#VirtualMedia.EjectMedia': { target: `${path}/Actions/VirtualMedia.EjectMedia` },
                },
              }),
        };
      }
    );

    app.post<{ Params: { managerId: string; mediaId: string } }>(
      `${ROOT}/Managers/:managerId/VirtualMedia/:mediaId/Actions/VirtualMedia.InsertMedia`,
      async (request, reply) => {
        if (!this.authorized(request)) return this.error(reply, 401, 'Unauthorized');
        const media = this.findMedia(request.params.managerId, request.params.mediaId);
        if (!media) return this.error(reply, 404, 'Resource not found');
        if (this.failures.has('insert')) return this.error(reply, 500, 'Insert action failed');
        if (media.inserted) return this.error(reply, 409, 'Media already inserted');
        const image = asRecord(request.body).Image;
        media.inserted = true;
        media.image = typeof image === 'string' ? image : undefined;
        return reply.code(204).send();
      }
    );

    app.post<{ Params: { managerId: string; mediaId: string } }>(
      `${ROOT}/Managers/:managerId/VirtualMedia/:mediaId/Actions/VirtualMedia.EjectMedia`,
      async (request, reply) => {
        if (!this.authorized(request)) return this.error(reply, 401, 'Unauthorized');
        const media = this.findMedia(request.params.managerId, request.params.mediaId);
        if (!media) return this.error(reply, 404, 'Resource not found');
        if (this.failures.has('eject')) return this.error(reply, 500, 'Eject action failed');
        media.inserted = false;
        media.image = undefined;
        return reply.code(204).send();
      }
    );

    await app.listen({ port: 0, host: '127.0.0.1' });
    const address = app.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('mock Redfish server did not bind to a TCP port');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
      this.server = null;
    }
  }

  private mediaPath(managerId: string, mediaId: string): string {
    return `${ROOT}/Managers/${managerId}/VirtualMedia/${mediaId}`;
  }

  private findMedia(managerId: string, mediaId: string): MockVirtualMedia | undefined {
    return this.managers
      .find((manager) => manager.id === managerId)
      ?.virtualMedia?.find((media) => media.id === mediaId);
  }

  private authorized(request: FastifyRequest): boolean {
    const token = request.headers['x-auth-token'];
    if (typeof token === 'string') {
      return [...this.tokens.values()].includes(token);
    }

    const header = request.headers.authorization;
    if (!header?.startsWith('Basic ')) return false;
    const [user, ...rest] = Buffer.from(header.slice(6), 'base64').toString('utf8').split(':');
    return user === this.username && rest.join(':') === this.password;
  }

  private error(reply: FastifyReply, status: number, message: string): FastifyReply {
    return reply.code(status).send({
      error: {
        code: 'Base.1.8.GeneralError',
        message,
        '@Message.ExtendedInfo': [{ Message: message }],
      },
    });
  }
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}
