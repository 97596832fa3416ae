import { z } from 'zod';
import type { Logger } from 'pino';

export const ODataLinkSchema = z.object({
  '@odata.id': z.string(),
});
export type ODataLink = z.infer<typeof ODataLinkSchema>;

export const ActionSchema = z
  .object({
    target: z.string(),
  })
  .passthrough();

export const ServiceRootSchema = z
  .object({
    RedfishVersion: z.string().optional(),
    Systems: ODataLinkSchema.optional(),
    Managers: ODataLinkSchema.optional(),
    SessionService: ODataLinkSchema.optional(),
    Links: z
      .object({
        Sessions: ODataLinkSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type ServiceRoot = z.infer<typeof ServiceRootSchema>;

export const ComputerSystemSchema = z
  .object({
    Id: z.string(),
    Links: z
      .object({
        ManagedBy: z.array(ODataLinkSchema).default([]),
      })
      .passthrough()
      .default({ ManagedBy: [] }),
    Actions: z
      .object({
        '#ComputerSystem.Reset': ActionSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type ComputerSystem = z.infer<typeof ComputerSystemSchema>;

export const ManagerSchema = z
  .object({
    Id: z.string(),
    VirtualMedia: ODataLinkSchema.optional(),
  })
  .passthrough();
export type Manager = z.infer<typeof ManagerSchema>;

export const CollectionSchema = z
  .object({
    Members: z.array(ODataLinkSchema).default([]),
  })
  .passthrough();
export type Collection = z.infer<typeof CollectionSchema>;

export const VirtualMediaSchema = z
  .object({
    Id: z.string(),
    MediaTypes: z.array(z.string()).default([]),
    Inserted: z.boolean().nullable().optional(),
    Image: z.string().nullable().optional(),
    Actions: z
      .object({
        '#VirtualMedia.InsertMedia': ActionSchema.optional(),
        '#VirtualMedia.EjectMedia': ActionSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type VirtualMedia = z.infer<typeof VirtualMediaSchema>;

export const RedfishErrorSchema = z.object({
  error: z
    .object({
      code: z.string().optional(),
      message: z.string().optional(),
      '@Message.ExtendedInfo': z
        .array(z.object({ Message: z.string().optional() }).passthrough())
        .optional(),
    })
    .passthrough(),
});

export type RedfishAuthMode = 'basic' | 'session';

export interface RedfishClientOptions {
  authMode?: RedfishAuthMode;
  /** Skip TLS certificate verification (BMCs commonly use self-signed certificates). */
  insecure?: boolean;
  timeoutMs?: number;
  logger?: Logger;
}
