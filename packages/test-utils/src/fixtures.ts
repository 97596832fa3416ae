/**
 * Shared test fixtures
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import pino, { type Logger } from 'pino';
import type { BootTarget, ManagedSystem, MediaKind, VirtualMediaResource } from '@vmboot/core';

export const silentLogger: Logger = pino({ level: 'silent' });

export async function createTempDir(prefix = 'vmboot-test'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const fixtures = {
  credentials: {
    user: 'admin',
    password: 'test-secret',
  },

  bootTarget(endpoint: string, imageURL = 'http://media.test:8080/images/test-config.iso'): BootTarget {
    return {
      endpoint,
      credentials: { ...fixtures.credentials },
      imageURL,
    };
  },

  system(managerRefs: string[], resourcePath = '/redfish/v1/Systems/1'): ManagedSystem {
    return {
      endpointBaseURL: 'https://bmc.test',
      resourcePath,
      managerRefs,
      resetTarget: `${resourcePath}/Actions/ComputerSystem.Reset`,
    };
  },

  media(
    managerRef: string,
    id: string,
    kinds: MediaKind[],
    state: { inserted?: boolean; image?: string } = {}
  ): VirtualMediaResource {
    const resourcePath = `${managerRef}/VirtualMedia/${id}`;
    return {
      id,
      resourcePath,
      managerRef,
      supportedMediaKinds: kinds,
      inserted: state.inserted ?? false,
      currentImageURL: state.image,
      actions: {
        insertMedia: `${resourcePath}/Actions/VirtualMedia.InsertMedia`,
        ejectMedia: `${resourcePath}/Actions/VirtualMedia.EjectMedia`,
      },
    };
  },
};
