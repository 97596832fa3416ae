import { z } from 'zod';
import { ConfigError } from '@vmboot/core';
import { AppConfig } from './types';

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const seconds = z.coerce.number().int().min(0);

const fileName = z
  .string()
  .regex(/^[^/\\]+$/, 'must be a plain file name')
  .refine((value) => value !== '.' && value !== '..', 'must be a plain file name');

export const EnvConfig = z.object({
  DATA_DIR: z.string().default('./data'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LISTEN_HOST: z.string().default('0.0.0.0'),
  BASE_URL: z.string().url().optional(),
  HTTPS_KEY_FILE: z.string().optional(),
  HTTPS_CERT_FILE: z.string().optional(),
  BMC_ADDRESS: z.string().url().optional(),
  BMC_USER: z.string().default(''),
  BMC_PASSWORD: z.string().default(''),
  BMC_AUTH: z.enum(['basic', 'session']).default('basic'),
  BMC_INSECURE: flag.default('false'),
  BOOT_DWELL_SECONDS: seconds.default(300),
  SHUTDOWN_GRACE_SECONDS: seconds.default(10),
  IMAGE_NAME: fileName.default('test-config.iso'),
  VOLUME_LABEL: z.string().default('test-config'),
  IMAGE_SOURCE_DIR: z.string().optional(),
});
export type EnvConfig = z.infer<typeof EnvConfig>;

export interface LoadedConfig {
  config: Readonly<AppConfig>;
  /** Non-fatal problems worth logging once a logger exists. */
  warnings: string[];
}

/**
 * Reads the process configuration from environment-style key/value pairs.
 * Empty values count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): LoadedConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== '')
  );

  const parsed = EnvConfig.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;
  const warnings: string[] = [];

  const keyFile = values.HTTPS_KEY_FILE;
  const certFile = values.HTTPS_CERT_FILE;
  const tls = keyFile && certFile ? { keyFile, certFile } : undefined;
  if (!tls && (keyFile || certFile)) {
    warnings.push('Only one of HTTPS_KEY_FILE and HTTPS_CERT_FILE is set; serving plain HTTP');
  }

  const scheme = tls ? 'https' : 'http';
  const config: AppConfig = {
    dataDir: values.DATA_DIR,
    logLevel: values.LOG_LEVEL,
    port: values.PORT,
    listenHost: values.LISTEN_HOST,
    baseURL: values.BASE_URL ?? `${scheme}://localhost:${values.PORT}`,
    tls,
    bmc: values.BMC_ADDRESS
      ? {
          address: values.BMC_ADDRESS,
          user: values.BMC_USER,
          password: values.BMC_PASSWORD,
          authMode: values.BMC_AUTH,
          insecure: values.BMC_INSECURE,
        }
      : undefined,
    dwellMs: values.BOOT_DWELL_SECONDS * 1000,
    shutdownGraceMs: values.SHUTDOWN_GRACE_SECONDS * 1000,
    imageName: values.IMAGE_NAME,
    volumeLabel: values.VOLUME_LABEL,
    imageSourceDir: values.IMAGE_SOURCE_DIR,
  };

  return { config: Object.freeze(config), warnings };
}
