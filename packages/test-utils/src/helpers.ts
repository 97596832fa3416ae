/**
 * Shared test doubles for the boot sequence
 */

import type {
  IManagementConnector,
  IManagementSession,
  InsertMediaOptions,
  ManagedSystem,
  ManagementEndpoint,
  ResetType,
  VirtualMediaResource,
} from '@vmboot/core';

export type SessionCall =
  | { op: 'connect'; endpoint: ManagementEndpoint }
  | { op: 'getSystem'; resourcePath: string }
  | { op: 'listVirtualMedia'; managerRef: string }
  | { op: 'ejectMedia'; mediaId: string }
  | { op: 'insertMedia'; mediaId: string; imageURL: string; options: InsertMediaOptions }
  | { op: 'resetSystem'; resetType: ResetType }
  | { op: 'delay'; ms: number }
  | { op: 'close' };

export type FakeOperation = Exclude<SessionCall['op'], 'delay'>;

export interface FakeManagementOptions {
  system: ManagedSystem;
  /** Virtual media per manager reference, in discovery order. */
  media: Record<string, VirtualMediaResource[]>;
  /** Operations that reject. `ejectMedia` may be limited to the n-th call. */
  failures?: Partial<Record<FakeOperation, Error>>;
  failEjectOnCall?: number;
}

/**
 * Records every call, in order, into one shared log. Pass `recordDelay()` as
 * the orchestrator's delay to see the dwell in the same sequence.
 */
export class FakeManagement implements IManagementConnector, IManagementSession {
  readonly calls: SessionCall[] = [];
  private ejectCalls = 0;

  constructor(private options: FakeManagementOptions) {}

  ops(): SessionCall['op'][] {
    return this.calls.map((call) => call.op);
  }

  recordDelay(): (ms: number) => Promise<void> {
    return async (ms: number) => {
      this.calls.push({ op: 'delay', ms });
    };
  }

  async connect(endpoint: ManagementEndpoint): Promise<IManagementSession> {
    this.calls.push({ op: 'connect', endpoint });
    this.maybeFail('connect');
    return this;
  }

  async getSystem(resourcePath: string): Promise<ManagedSystem> {
    this.calls.push({ op: 'getSystem', resourcePath });
    this.maybeFail('getSystem');
    return this.options.system;
  }

  async listVirtualMedia(managerRef: string): Promise<VirtualMediaResource[]> {
    this.calls.push({ op: 'listVirtualMedia', managerRef });
    this.maybeFail('listVirtualMedia');
    return this.options.media[managerRef] ?? [];
  }

  async ejectMedia(media: VirtualMediaResource): Promise<void> {
    this.calls.push({ op: 'ejectMedia', mediaId: media.id });
    this.ejectCalls++;
    const limit = this.options.failEjectOnCall;
    if (limit === undefined || limit === this.ejectCalls) {
      this.maybeFail('ejectMedia');
    }
  }

  async insertMedia(media: VirtualMediaResource, imageURL: string, options: InsertMediaOptions): Promise<void> {
    this.calls.push({ op: 'insertMedia', mediaId: media.id, imageURL, options });
    this.maybeFail('insertMedia');
  }

  async resetSystem(_system: ManagedSystem, resetType: ResetType): Promise<void> {
    this.calls.push({ op: 'resetSystem', resetType });
    this.maybeFail('resetSystem');
  }

  async close(): Promise<void> {
    this.calls.push({ op: 'close' });
    this.maybeFail('close');
  }

  private maybeFail(op: FakeOperation): void {
    const error = this.options.failures?.[op];
    if (error) throw error;
  }
}
