import axios from 'axios';
import { RedfishErrorSchema } from './types';

export class RedfishRequestError extends Error {
  readonly method: string;
  readonly path: string;
  readonly status?: number;

  constructor(method: string, path: string, detail: string, options?: { status?: number; cause?: unknown }) {
    const status = options?.status ? ` (HTTP ${options.status})` : '';
    super(`${method} ${path} failed${status}: ${detail}`, { cause: options?.cause });
    this.name = 'RedfishRequestError';
    this.method = method;
    this.path = path;
    this.status = options?.status;
  }
}

export function toRedfishError(method: string, path: string, error: unknown): RedfishRequestError {
  if (error instanceof RedfishRequestError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const body = RedfishErrorSchema.safeParse(error.response?.data);
    const detail = body.success
      ? body.data.error['@Message.ExtendedInfo']?.[0]?.Message ?? body.data.error.message
      : undefined;
    return new RedfishRequestError(method, path, detail ?? error.message, { status, cause: error });
  }

  return new RedfishRequestError(method, path, error instanceof Error ? error.message : String(error), {
    cause: error,
  });
}
