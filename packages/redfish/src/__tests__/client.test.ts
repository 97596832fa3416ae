/**
 * Redfish client tests
 *
 * Every test runs against the in-process mock Redfish service.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockManager, MockRedfishServer, MockRedfishServerOptions, silentLogger } from '@vmboot/test-utils';
import { RedfishConnector, RedfishSession } from '../client';
import { RedfishRequestError } from '../errors';

const MANAGERS: MockManager[] = [
  {
    id: 'BMC1',
    virtualMedia: [
      { id: 'RemovableDisk', mediaTypes: ['USBStick', 'Floppy'] },
      { id: 'Cd', mediaTypes: ['CD', 'DVD', 'BlueRay'], inserted: true, image: 'http://old.test/old.iso' },
    ],
  },
  { id: 'BMC2' },
];

describe('RedfishConnector', () => {
  let mock: MockRedfishServer;
  let baseURL: string;

  async function startMock(options: MockRedfishServerOptions = {}): Promise<void> {
    // The mock mutates media state, so each server gets its own copy.
    mock = new MockRedfishServer({ managers: structuredClone(MANAGERS), ...options });
    baseURL = await mock.start();
  }

  async function rejection(promise: Promise<unknown>): Promise<RedfishRequestError> {
    const error = await promise.then(
      () => undefined,
      (reason: unknown) => reason
    );
    if (!(error instanceof RedfishRequestError)) {
      throw new Error(`expected a RedfishRequestError, got ${String(error)}`);
    }
    return error;
  }

  afterEach(async () => {
    await mock.stop();
  });

  describe('basic auth', () => {
    let session: RedfishSession;

    beforeEach(async () => {
      await startMock();
      const connector = new RedfishConnector({ logger: silentLogger });
      session = await connector.connect({ baseURL, user: 'admin', password: 'test-secret' });
    });

    it('should read the service root and verify credentials on connect', () => {
      expect(mock.calls.map((call) => `${call.method} ${call.path}`)).toEqual([
        'GET /redfish/v1/',
        'GET /redfish/v1/Systems',
      ]);
    });

    it('should resolve the system with its managers and reset target', async () => {
      const system = await session.getSystem(mock.systemPath);

      expect(system).toEqual({
        endpointBaseURL: baseURL,
        resourcePath: '/redfish/v1/Systems/System.Embedded.1',
        managerRefs: ['/redfish/v1/Managers/BMC1', '/redfish/v1/Managers/BMC2'],
        resetTarget: '/redfish/v1/Systems/System.Embedded.1/Actions/ComputerSystem.Reset',
      });
    });

    it('should fail to resolve an unknown system', async () => {
      const error = await rejection(session.getSystem('/redfish/v1/Systems/Missing'));

      expect(error.status).toBe(404);
      expect(error.message).toBe('GET /redfish/v1/Systems/Missing failed (HTTP 404): Resource not found');
    });

    it('should list virtual media in collection order and drop unknown media types', async () => {
      const media = await session.listVirtualMedia('/redfish/v1/Managers/BMC1');

      expect(media).toEqual([
        {
          id: 'RemovableDisk',
          resourcePath: '/redfish/v1/Managers/BMC1/VirtualMedia/RemovableDisk',
          managerRef: '/redfish/v1/Managers/BMC1',
          supportedMediaKinds: ['USBStick', 'Floppy'],
          inserted: false,
          currentImageURL: undefined,
          actions: {
            insertMedia: '/redfish/v1/Managers/BMC1/VirtualMedia/RemovableDisk/Actions/VirtualMedia.InsertMedia',
            ejectMedia: '/redfish/v1/Managers/BMC1/VirtualMedia/RemovableDisk/Actions/VirtualMedia.EjectMedia',
          },
        },
        {
          id: 'Cd',
          resourcePath: '/redfish/v1/Managers/BMC1/VirtualMedia/Cd',
          managerRef: '/redfish/v1/Managers/BMC1',
          supportedMediaKinds: ['CD', 'DVD'],
          inserted: true,
          currentImageURL: 'http://old.test/old.iso',
          actions: {
            insertMedia: '/redfish/v1/Managers/BMC1/VirtualMedia/Cd/Actions/VirtualMedia.InsertMedia',
            ejectMedia: '/redfish/v1/Managers/BMC1/VirtualMedia/Cd/Actions/VirtualMedia.EjectMedia',
          },
        },
      ]);
    });

    it('should report no media for a manager without a VirtualMedia collection', async () => {
      expect(await session.listVirtualMedia('/redfish/v1/Managers/BMC2')).toEqual([]);
    });

    it('should eject and insert media through the advertised actions', async () => {
      const [, cd] = await session.listVirtualMedia('/redfish/v1/Managers/BMC1');

      await session.ejectMedia(cd);
      await session.insertMedia(cd, 'http://media.test/images/test-config.iso', {
        inserted: true,
        writeProtected: true,
      });

      expect(mock.mutations()).toEqual([
        { method: 'POST', path: `${cd.resourcePath}/Actions/VirtualMedia.EjectMedia`, body: {} },
        {
          method: 'POST',
          path: `${cd.resourcePath}/Actions/VirtualMedia.InsertMedia`,
          body: { Image: 'http://media.test/images/test-config.iso', Inserted: true, WriteProtected: true },
        },
      ]);
      expect(mock.media('BMC1', 'Cd')).toMatchObject({
        inserted: true,
        image: 'http://media.test/images/test-config.iso',
      });
    });

    it('should surface the Redfish error message of a rejected action', async () => {
      const [, cd] = await session.listVirtualMedia('/redfish/v1/Managers/BMC1');

      const error = await rejection(
        session.insertMedia(cd, 'http://media.test/images/test-config.iso', { inserted: true, writeProtected: true })
      );

      expect(error.status).toBe(409);
      expect(error.message).toBe(
        'POST /redfish/v1/Managers/BMC1/VirtualMedia/Cd/Actions/VirtualMedia.InsertMedia failed (HTTP 409): Media already inserted'
      );
    });

    it('should reset the system through its reset target', async () => {
      const system = await session.getSystem(mock.systemPath);

      await session.resetSystem(system, 'On');

      expect(mock.resets).toEqual(['On']);
    });

    it('should fall back to the conventional reset path when none is advertised', async () => {
      const system = await session.getSystem(mock.systemPath);

      await session.resetSystem({ ...system, resetTarget: undefined }, 'ForceRestart');

      expect(mock.mutations()).toEqual([
        {
          method: 'POST',
          path: '/redfish/v1/Systems/System.Embedded.1/Actions/ComputerSystem.Reset',
          body: { ResetType: 'ForceRestart' },
        },
      ]);
    });

    it('should make close a no-op', async () => {
      await session.close();

      expect(mock.mutations()).toEqual([]);
    });
  });

  describe('basic auth failures', () => {
    it('should reject wrong credentials on connect', async () => {
      await startMock();
      const connector = new RedfishConnector({ logger: silentLogger });

      const error = await rejection(connector.connect({ baseURL, user: 'admin', password: 'wrong' }));

      expect(error.status).toBe(401);
      expect(error.method).toBe('GET');
      expect(error.path).toBe('/redfish/v1/Systems');
    });
  });

  describe('session auth', () => {
    it('should authenticate with a session token and delete the session on close', async () => {
      await startMock();
      const connector = new RedfishConnector({ authMode: 'session', logger: silentLogger });

      const session = await connector.connect({ baseURL, user: 'admin', password: 'test-secret' });
      expect(mock.activeSessions).toBe(1);

      const system = await session.getSystem(mock.systemPath);
      expect(system.managerRefs).toHaveLength(2);

      await session.close();
      await session.close();

      expect(mock.activeSessions).toBe(0);
      expect(mock.mutations().map((call) => `${call.method} ${call.path}`)).toEqual([
        'POST /redfish/v1/SessionService/Sessions',
        'DELETE /redfish/v1/SessionService/Sessions/1',
      ]);
    });

    it('should reject wrong credentials when creating the session', async () => {
      await startMock();
      const connector = new RedfishConnector({ authMode: 'session', logger: silentLogger });

      const error = await rejection(connector.connect({ baseURL, user: 'admin', password: 'wrong' }));

      expect(error.status).toBe(401);
      expect(error.message).toBe('POST /redfish/v1/SessionService/Sessions failed (HTTP 401): Invalid credentials');
      expect(mock.activeSessions).toBe(0);
    });
  });

  describe('resources without actions', () => {
    it('should refuse to insert into media that does not advertise InsertMedia', async () => {
      await startMock({
        managers: [{ id: 'BMC1', virtualMedia: [{ id: 'Cd', mediaTypes: ['CD'], actions: false }] }],
      });
      const session = await new RedfishConnector({ logger: silentLogger }).connect({
        baseURL,
        user: 'admin',
        password: 'test-secret',
      });
      const [cd] = await session.listVirtualMedia('/redfish/v1/Managers/BMC1');

      const insert = await rejection(
        session.insertMedia(cd, 'http://media.test/images/test-config.iso', { inserted: true, writeProtected: true })
      );
      const eject = await rejection(session.ejectMedia(cd));

      expect(insert.message).toBe(
        'POST /redfish/v1/Managers/BMC1/VirtualMedia/Cd failed: resource does not support VirtualMedia.InsertMedia'
      );
      expect(eject.message).toBe(
        'POST /redfish/v1/Managers/BMC1/VirtualMedia/Cd failed: resource does not support VirtualMedia.EjectMedia'
      );
      expect(mock.mutations()).toEqual([]);
    });
  });
});
