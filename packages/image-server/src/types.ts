import type { FastifyBaseLogger } from 'fastify';
import type { Logger } from 'pino';
import type { Delay, IImageBuilder, IManagementConnector } from '@vmboot/core';
import type { RedfishAuthMode } from '@vmboot/redfish';

export interface TlsFiles {
  keyFile: string;
  certFile: string;
}

export interface MediaServerOptions {
  /** Directory whose files are served under the images prefix. */
  rootDir: string;
  host: string;
  port: number;
  tls?: TlsFiles;
  logger?: FastifyBaseLogger;
}

export interface BmcConfig {
  address: string;
  user: string;
  password: string;
  authMode: RedfishAuthMode;
  insecure: boolean;
}

export interface AppConfig {
  dataDir: string;
  logLevel: string;
  port: number;
  listenHost: string;
  baseURL: string;
  tls?: TlsFiles;
  bmc?: BmcConfig;
  dwellMs: number;
  shutdownGraceMs: number;
  imageName: string;
  volumeLabel: string;
  imageSourceDir?: string;
}

export interface ConfigImageServerDeps {
  builder?: IImageBuilder;
  connector?: IManagementConnector;
  delay?: Delay;
  logger?: Logger;
}
