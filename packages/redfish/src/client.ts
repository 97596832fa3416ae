import axios, { AxiosInstance, AxiosResponse } from 'axios';
import * as https from 'https';
import pino, { type Logger } from 'pino';
import { z } from 'zod';
import {
  IManagementConnector,
  IManagementSession,
  InsertMediaOptions,
  ManagedSystem,
  ManagementEndpoint,
  MediaKind,
  ResetType,
  VirtualMediaResource,
} from '@vmboot/core';
import { RedfishRequestError, toRedfishError } from './errors';
import {
  CollectionSchema,
  ComputerSystemSchema,
  ManagerSchema,
  RedfishAuthMode,
  RedfishClientOptions,
  ServiceRootSchema,
  VirtualMedia,
  VirtualMediaSchema,
} from './types';

export const SERVICE_ROOT_PATH = '/redfish/v1/';
export const SESSIONS_PATH = '/redfish/v1/SessionService/Sessions';
const SYSTEMS_PATH = '/redfish/v1/Systems';

type HttpMethod = 'GET' | 'POST' | 'DELETE';

async function send(
  http: AxiosInstance,
  method: HttpMethod,
  path: string,
  data?: Record<string, unknown>
): Promise<AxiosResponse<unknown>> {
  try {
    return await http.request<unknown>({ method, url: path, data });
  } catch (error) {
    throw toRedfishError(method, path, error);
  }
}

async function get<T extends z.ZodTypeAny>(http: AxiosInstance, path: string, schema: T): Promise<z.infer<T>> {
  const response = await send(http, 'GET', path);
  const parsed = schema.safeParse(response.data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new RedfishRequestError('GET', path, `unexpected payload (${issues.join(', ')})`, {
      status: response.status,
    });
  }
  return parsed.data;
}

function redactBody(data: unknown): unknown {
  if (data !== null && typeof data === 'object' && 'Password' in data) {
    return { ...data, Password: '[redacted]' };
  }
  return data;
}

/**
 * Opens sessions against a Redfish service. Basic auth sends credentials
 * with every request; session auth trades them for an X-Auth-Token once.
 */
export class RedfishConnector implements IManagementConnector {
  private logger: Logger;
  private authMode: RedfishAuthMode;

  constructor(private options: RedfishClientOptions = {}) {
    this.logger = options.logger ?? pino({ name: 'redfish' });
    this.authMode = options.authMode ?? 'basic';
  }

  async connect(endpoint: ManagementEndpoint): Promise<RedfishSession> {
    const http = axios.create({
      baseURL: endpoint.baseURL,
      timeout: this.options.timeoutMs || 30000,
      headers: {
        Accept: 'application/json',
        'OData-Version': '4.0',
      },
      httpsAgent: this.options.insecure ? new https.Agent({ rejectUnauthorized: false }) : undefined,
    });
    this.traceTraffic(http);

    const root = await get(http, SERVICE_ROOT_PATH, ServiceRootSchema);
    this.logger.debug({ endpoint: endpoint.baseURL, version: root.RedfishVersion }, 'Redfish service root');

    if (this.authMode === 'session') {
      const sessionsPath = root.Links?.Sessions?.['@odata.id'] ?? SESSIONS_PATH;
      const response = await send(http, 'POST', sessionsPath, {
        UserName: endpoint.user,
        Password: endpoint.password,
      });
      const token = response.headers['x-auth-token'];
      const location = response.headers['location'];
      if (typeof token !== 'string' || token.length === 0) {
        throw new RedfishRequestError('POST', sessionsPath, 'session response carried no X-Auth-Token', {
          status: response.status,
        });
      }
      http.defaults.headers.common['X-Auth-Token'] = token;
      const sessionLocation = typeof location === 'string' ? location : undefined;
      return new RedfishSession(http, endpoint.baseURL, this.logger, sessionLocation);
    }

    http.defaults.auth = { username: endpoint.user, password: endpoint.password };
    // The service root is readable anonymously; this request proves the credentials.
    await send(http, 'GET', root.Systems?.['@odata.id'] ?? SYSTEMS_PATH);
    return new RedfishSession(http, endpoint.baseURL, this.logger);
  }

  private traceTraffic(http: AxiosInstance): void {
    http.interceptors.request.use((config) => {
      this.logger.debug(
        { method: config.method?.toUpperCase(), url: config.url, body: redactBody(config.data) },
        'Redfish request'
      );
      return config;
    });
    http.interceptors.response.use((response) => {
      this.logger.debug(
        { status: response.status, url: response.config.url, body: response.data },
        'Redfish response'
      );
      return response;
    });
  }
}

export class RedfishSession implements IManagementSession {
  constructor(
    private http: AxiosInstance,
    private baseURL: string,
    private logger: Logger,
    private sessionLocation?: string
  ) {}

  async getSystem(resourcePath: string): Promise<ManagedSystem> {
    const system = await get(this.http, resourcePath, ComputerSystemSchema);

    return {
      endpointBaseURL: this.baseURL,
      resourcePath,
      managerRefs: system.Links.ManagedBy.map((link) => link['@odata.id']),
      resetTarget: system.Actions?.['#ComputerSystem.Reset']?.target,
    };
  }

  /** Virtual media of one manager, in collection order. */
  async listVirtualMedia(managerRef: string): Promise<VirtualMediaResource[]> {
    const manager = await get(this.http, managerRef, ManagerSchema);
    const collectionPath = manager.VirtualMedia?.['@odata.id'];
    if (!collectionPath) {
      this.logger.debug({ manager: managerRef }, 'Manager exposes no virtual media');
      return [];
    }

    const collection = await get(this.http, collectionPath, CollectionSchema);
    const resources: VirtualMediaResource[] = [];
    for (const member of collection.Members) {
      const media = await get(this.http, member['@odata.id'], VirtualMediaSchema);
      resources.push(toVirtualMediaResource(media, member['@odata.id'], managerRef));
    }
    return resources;
  }

  async ejectMedia(media: VirtualMediaResource): Promise<void> {
    const target = media.actions.ejectMedia;
    if (!target) {
      throw new RedfishRequestError('POST', media.resourcePath, 'resource does not support VirtualMedia.EjectMedia');
    }
    await send(this.http, 'POST', target, {});
  }

  async insertMedia(media: VirtualMediaResource, imageURL: string, options: InsertMediaOptions): Promise<void> {
    const target = media.actions.insertMedia;
    if (!target) {
      throw new RedfishRequestError('POST', media.resourcePath, 'resource does not support VirtualMedia.InsertMedia');
    }
    await send(this.http, 'POST', target, {
      Image: imageURL,
      Inserted: options.inserted,
      WriteProtected: options.writeProtected,
    });
  }

  async resetSystem(system: ManagedSystem, resetType: ResetType): Promise<void> {
    const target =
      system.resetTarget ?? `${system.resourcePath.replace(/\/+$/, '')}/Actions/ComputerSystem.Reset`;
    await send(this.http, 'POST', target, { ResetType: resetType });
  }

  async close(): Promise<void> {
    if (!this.sessionLocation) return;
    const location = this.sessionLocation;
    this.sessionLocation = undefined;
    await send(this.http, 'DELETE', location);
  }
}

export function toVirtualMediaResource(
  media: VirtualMedia,
  resourcePath: string,
  managerRef: string
): VirtualMediaResource {
  const supportedMediaKinds = media.MediaTypes.flatMap((type) => {
    const kind = MediaKind.safeParse(type);
    return kind.success ? [kind.data] : [];
  });

  return {
    id: media.Id,
    resourcePath,
    managerRef,
    supportedMediaKinds,
    inserted: media.Inserted === true,
    currentImageURL: media.Image ?? undefined,
    actions: {
      insertMedia: media.Actions?.['#VirtualMedia.InsertMedia']?.target,
      ejectMedia: media.Actions?.['#VirtualMedia.EjectMedia']?.target,
    },
  };
}
