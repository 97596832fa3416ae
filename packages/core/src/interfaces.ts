import type {
  BootTarget,
  InsertMediaOptions,
  ManagedSystem,
  OrchestrationResult,
  ResetType,
  VirtualMediaResource,
} from './types';

export interface IImageBuilder {
  create(outputPath: string, workDir: string, volumeLabel: string): Promise<void>;
}

export interface ManagementEndpoint {
  baseURL: string;
  user: string;
  password: string;
}

export interface IManagementConnector {
  connect(endpoint: ManagementEndpoint): Promise<IManagementSession>;
}

/**
 * The capabilities the boot sequence needs from an out-of-band management
 * service. Every read is a fresh snapshot of remote state.
 */
export interface IManagementSession {
  getSystem(resourcePath: string): Promise<ManagedSystem>;
  listVirtualMedia(managerRef: string): Promise<VirtualMediaResource[]>;
  ejectMedia(media: VirtualMediaResource): Promise<void>;
  insertMedia(media: VirtualMediaResource, imageURL: string, options: InsertMediaOptions): Promise<void>;
  resetSystem(system: ManagedSystem, resetType: ResetType): Promise<void>;
  close(): Promise<void>;
}

export interface IBootOrchestrator {
  orchestrate(target: BootTarget): Promise<OrchestrationResult>;
}

export interface IMediaServer {
  readonly url: string | undefined;
  start(): Promise<string>;
  stop(graceMs?: number): Promise<void>;
}

export type Delay = (ms: number) => Promise<void>;
