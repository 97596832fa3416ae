import { z } from 'zod';

export const MediaKind = z.enum(['CD', 'DVD', 'Floppy', 'USBStick']);
export type MediaKind = z.infer<typeof MediaKind>;

// Redfish reports optical drives as "CD"; that is the only kind we boot from.
export const OPTICAL_MEDIA_KIND: MediaKind = 'CD';

export const ResetType = z.enum([
  'On',
  'ForceOff',
  'GracefulShutdown',
  'GracefulRestart',
  'ForceRestart',
  'ForceOn',
  'PowerCycle',
]);
export type ResetType = z.infer<typeof ResetType>;

export const VOLUME_LABEL_MAX_LENGTH = 32;

export const VolumeLabel = z
  .string()
  .min(1)
  .max(VOLUME_LABEL_MAX_LENGTH)
  .regex(/^[A-Za-z0-9 _.-]+$/, 'volume label may only contain letters, digits, space, "_", "." and "-"');
export type VolumeLabel = z.infer<typeof VolumeLabel>;

export const ImageSpec = z.object({
  workDir: z.string().min(1),
  volumeLabel: VolumeLabel,
  outputPath: z.string().min(1),
});
export type ImageSpec = z.infer<typeof ImageSpec>;

export const ManagedSystem = z.object({
  endpointBaseURL: z.string().url(),
  resourcePath: z.string().startsWith('/'),
  managerRefs: z.array(z.string()),
  resetTarget: z.string().optional(),
});
export type ManagedSystem = z.infer<typeof ManagedSystem>;

export const VirtualMediaResource = z.object({
  id: z.string(),
  resourcePath: z.string(),
  managerRef: z.string(),
  supportedMediaKinds: z.array(MediaKind),
  inserted: z.boolean(),
  currentImageURL: z.string().optional(),
  actions: z.object({
    insertMedia: z.string().optional(),
    ejectMedia: z.string().optional(),
  }),
});
export type VirtualMediaResource = z.infer<typeof VirtualMediaResource>;

export const Credentials = z.object({
  user: z.string(),
  password: z.string(),
});
export type Credentials = z.infer<typeof Credentials>;

export const BootTarget = z.object({
  endpoint: z.string().url(),
  credentials: Credentials,
  imageURL: z.string().url(),
});
export type BootTarget = z.infer<typeof BootTarget>;

export interface InsertMediaOptions {
  inserted: boolean;
  writeProtected: boolean;
}

export type OrchestrationState =
  | 'Connect'
  | 'SystemResolved'
  | 'MediaDiscovered'
  | 'MediaSelected'
  | 'MediaEjected'
  | 'MediaReady'
  | 'MediaInserted'
  | 'BootIssued'
  | 'Done';

export interface OrchestrationResult {
  states: OrchestrationState[];
  system: ManagedSystem;
  media: VirtualMediaResource;
  ejectedBeforeInsert: boolean;
  dwellCompleted: boolean;
  postDwellEjectError?: Error;
}

/**
 * Splits a management endpoint such as `https://bmc/redfish/v1/Systems/1`
 * into the service base (`https://bmc`) and the system resource path.
 */
export function parseManagementEndpoint(endpoint: string): { baseURL: string; resourcePath: string } {
  const url = new URL(endpoint);
  return {
    baseURL: `${url.protocol}//${url.host}`,
    resourcePath: url.pathname,
  };
}
