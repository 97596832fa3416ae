import * as fs from 'fs/promises';
import * as path from 'path';
import pino, { type Logger } from 'pino';
import {
  IImageBuilder,
  IManagementConnector,
  OrchestrationError,
  OrchestrationResult,
} from '@vmboot/core';
import { createWorkDir, IsoBuilder, removeWorkDir, stageDirectory, stageFiles } from '@vmboot/iso-builder';
import { BootOrchestrator, sleep } from '@vmboot/orchestrator';
import { RedfishConnector } from '@vmboot/redfish';
import { buildImageUrl, MediaServer } from './server';
import { AppConfig, ConfigImageServerDeps } from './types';

export const ISOS_DIR_NAME = 'isos';
export const WORK_DIR_PREFIX = 'test-config';
export const DEFAULT_IMAGE_FILES: Record<string, string> = { config: 'config-data' };

export interface StartResult {
  /** Where the media server listens. */
  serverURL: string;
  /** URL handed to the management endpoint. */
  imageURL: string;
  imagePath: string;
  /** Absent when no management endpoint is configured or the boot failed. */
  boot?: OrchestrationResult;
  bootError?: OrchestrationError;
}

/**
 * Startup sequence of the process: build the image, serve it, then ask the
 * management endpoint (when one is configured) to boot from it.
 */
export class ConfigImageServer {
  private logger: Logger;
  private builder: IImageBuilder;
  private connector: IManagementConnector | undefined;
  private server: MediaServer;
  private starting: Promise<StartResult> | undefined;
  private stopping = false;

  constructor(
    private config: Readonly<AppConfig>,
    private deps: ConfigImageServerDeps = {}
  ) {
    this.logger = deps.logger ?? pino({ name: 'vmedia-boot', level: config.logLevel });
    this.builder = deps.builder ?? new IsoBuilder({ logger: this.logger.child({ component: 'iso-builder' }) });
    this.connector =
      deps.connector ??
      (config.bmc
        ? new RedfishConnector({
            authMode: config.bmc.authMode,
            insecure: config.bmc.insecure,
            logger: this.logger.child({ component: 'redfish' }),
          })
        : undefined);
    this.server = new MediaServer({
      rootDir: this.isosDir,
      host: config.listenHost,
      port: config.port,
      tls: config.tls,
      logger: this.logger.child({ component: 'media-server' }),
    });
  }

  get isosDir(): string {
    return path.join(this.config.dataDir, ISOS_DIR_NAME);
  }

  get imagePath(): string {
    return path.join(this.isosDir, this.config.imageName);
  }

  get imageURL(): string {
    return buildImageUrl(this.config.baseURL, this.config.imageName);
  }

  get mediaServer(): MediaServer {
    return this.server;
  }

  /** True once `stop()` has been called. */
  get stopRequested(): boolean {
    return this.stopping;
  }

  start(): Promise<StartResult> {
    const starting = this.run().finally(() => {
      this.starting = undefined;
    });
    this.starting = starting;
    return starting;
  }

  /**
   * Drains the media server. A boot sequence in progress is not interrupted:
   * the server stops only after `start()` has settled, so a configured final
   * eject still runs.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.starting) {
      this.logger.info('Waiting for startup and boot sequence to finish before stopping');
      await Promise.allSettled([this.starting]);
    }
    await this.server.stop(this.config.shutdownGraceMs);
  }

  private async run(): Promise<StartResult> {
    await fs.mkdir(this.isosDir, { recursive: true });
    await this.buildImage();

    const serverURL = await this.server.start();
    const result: StartResult = { serverURL, imageURL: this.imageURL, imagePath: this.imagePath };

    const bmc = this.config.bmc;
    if (!bmc || !this.connector) {
      this.logger.info('No management endpoint configured, serving image only');
      return result;
    }

    const orchestrator = new BootOrchestrator(this.connector, {
      dwellMs: this.config.dwellMs,
      delay: this.deps.delay ?? sleep,
      logger: this.logger.child({ component: 'boot-orchestrator' }),
    });

    try {
      result.boot = await orchestrator.orchestrate({
        endpoint: bmc.address,
        credentials: { user: bmc.user, password: bmc.password },
        imageURL: this.imageURL,
      });
      this.logger.info({ media: result.boot.media.id }, 'Boot orchestration complete');
    } catch (error) {
      if (!(error instanceof OrchestrationError)) throw error;
      // The image stays available to anyone who finds it out of band.
      result.bootError = error;
      this.logger.error(
        { err: error, kind: error.kind, step: error.step, resource: error.resourceId },
        'Boot orchestration failed, continuing to serve image'
      );
    }

    return result;
  }

  private async buildImage(): Promise<void> {
    const workDir = await createWorkDir(this.config.dataDir, WORK_DIR_PREFIX);
    try {
      if (this.config.imageSourceDir) {
        await stageDirectory(workDir, this.config.imageSourceDir);
      } else {
        await stageFiles(workDir, DEFAULT_IMAGE_FILES);
      }
      await this.builder.create(this.imagePath, workDir, this.config.volumeLabel);
    } finally {
      await removeWorkDir(workDir);
    }
    this.logger.info({ image: this.imagePath, label: this.config.volumeLabel }, 'Image built');
  }
}
