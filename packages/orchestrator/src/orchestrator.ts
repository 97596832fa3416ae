import pino, { type Logger } from 'pino';
import {
  BootTarget,
  Delay,
  IBootOrchestrator,
  IManagementConnector,
  IManagementSession,
  ManagedSystem,
  OPTICAL_MEDIA_KIND,
  OrchestrationError,
  OrchestrationResult,
  OrchestrationState,
  parseManagementEndpoint,
  VirtualMediaResource,
} from '@vmboot/core';
import { BootOrchestratorOptions } from './types';

export const sleep: Delay = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Mounts an image on a managed system's optical virtual media and powers the
 * system on so it boots from it. One attempt per call; nothing is retried.
 *
 * Connect -> SystemResolved -> MediaDiscovered -> MediaSelected
 *   -> [MediaEjected] -> MediaReady -> MediaInserted -> BootIssued -> Done
 */
export class BootOrchestrator implements IBootOrchestrator {
  private logger: Logger;
  private delay: Delay;
  private dwellMs: number;

  constructor(
    private connector: IManagementConnector,
    options: BootOrchestratorOptions = {}
  ) {
    this.logger = options.logger ?? pino({ name: 'boot-orchestrator' });
    this.delay = options.delay ?? sleep;
    this.dwellMs = options.dwellMs ?? 0;
  }

  async orchestrate(target: BootTarget): Promise<OrchestrationResult> {
    const states: OrchestrationState[] = [];
    const enter = (state: OrchestrationState) => {
      states.push(state);
      this.logger.debug({ state }, 'Boot orchestration state');
    };

    enter('Connect');
    let baseURL: string;
    let resourcePath: string;
    try {
      ({ baseURL, resourcePath } = parseManagementEndpoint(target.endpoint));
    } catch (error) {
      throw new OrchestrationError('ConnectFailed', 'Connect', 'invalid management endpoint', {
        resourceId: target.endpoint,
        cause: error,
      });
    }

    let session: IManagementSession;
    try {
      session = await this.connector.connect({
        baseURL,
        user: target.credentials.user,
        password: target.credentials.password,
      });
    } catch (error) {
      throw new OrchestrationError('ConnectFailed', 'Connect', 'cannot open management session', {
        resourceId: baseURL,
        cause: error,
      });
    }

    try {
      return await this.run(session, target, resourcePath, states, enter);
    } finally {
      await this.closeSession(session);
    }
  }

  private async run(
    session: IManagementSession,
    target: BootTarget,
    resourcePath: string,
    states: OrchestrationState[],
    enter: (state: OrchestrationState) => void
  ): Promise<OrchestrationResult> {
    enter('SystemResolved');
    let system: ManagedSystem;
    try {
      system = await session.getSystem(resourcePath);
    } catch (error) {
      throw new OrchestrationError('SystemNotFound', 'SystemResolved', 'cannot resolve managed system', {
        resourceId: resourcePath,
        cause: error,
      });
    }

    enter('MediaDiscovered');
    const media = await this.discoverOpticalMedia(session, system);
    this.logger.info({ media: media.resourcePath, inserted: media.inserted }, 'Selected virtual media');

    enter('MediaSelected');
    let ejectedBeforeInsert = false;
    if (media.inserted) {
      try {
        await session.ejectMedia(media);
      } catch (error) {
        throw new OrchestrationError('EjectFailed', 'MediaSelected', 'cannot eject current media', {
          resourceId: media.id,
          cause: error,
        });
      }
      ejectedBeforeInsert = true;
      this.logger.info({ media: media.id, image: media.currentImageURL }, 'Ejected previously inserted media');
      enter('MediaEjected');
    }

    enter('MediaReady');
    try {
      await session.insertMedia(media, target.imageURL, { inserted: true, writeProtected: true });
    } catch (error) {
      throw new OrchestrationError('InsertFailed', 'MediaReady', `cannot insert ${target.imageURL}`, {
        resourceId: media.id,
        cause: error,
      });
    }
    this.logger.info({ media: media.id, image: target.imageURL }, 'Media inserted, booting host');

    enter('MediaInserted');
    try {
      await session.resetSystem(system, 'On');
    } catch (error) {
      throw new OrchestrationError('ResetFailed', 'MediaInserted', 'cannot power on system', {
        resourceId: system.resourcePath,
        cause: error,
      });
    }

    enter('BootIssued');
    let dwellCompleted = false;
    let postDwellEjectError: OrchestrationError | undefined;
    if (this.dwellMs > 0) {
      this.logger.info({ dwellMs: this.dwellMs }, 'Waiting before ejecting boot media');
      await this.delay(this.dwellMs);
      dwellCompleted = true;
      try {
        await session.ejectMedia(media);
        this.logger.info({ media: media.id }, 'Media ejected');
      } catch (error) {
        postDwellEjectError = new OrchestrationError(
          'PostDwellEjectFailed',
          'BootIssued',
          'cannot eject media after dwell',
          { resourceId: media.id, cause: error }
        );
        this.logger.error({ err: postDwellEjectError }, 'Failed to eject media after dwell');
      }
    }

    enter('Done');
    return { states, system, media, ejectedBeforeInsert, dwellCompleted, postDwellEjectError };
  }

  /**
   * First resource that supports optical media, in manager order and then
   * collection order. Managers after the first match are not enumerated.
   */
  private async discoverOpticalMedia(
    session: IManagementSession,
    system: ManagedSystem
  ): Promise<VirtualMediaResource> {
    for (const managerRef of system.managerRefs) {
      let resources: VirtualMediaResource[];
      try {
        resources = await session.listVirtualMedia(managerRef);
      } catch (error) {
        throw new OrchestrationError('DiscoveryFailed', 'MediaDiscovered', 'cannot enumerate virtual media', {
          resourceId: managerRef,
          cause: error,
        });
      }

      const match = resources.find((resource) => resource.supportedMediaKinds.includes(OPTICAL_MEDIA_KIND));
      if (match) return match;
    }

    throw new OrchestrationError(
      'NoCompatibleMedia',
      'MediaDiscovered',
      `no ${OPTICAL_MEDIA_KIND} virtual media across ${system.managerRefs.length} manager(s)`,
      { resourceId: system.resourcePath }
    );
  }

  private async closeSession(session: IManagementSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.logger.warn({ err: error }, 'Failed to close management session');
    }
  }
}
