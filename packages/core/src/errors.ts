export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: unknown }) {
    super(`Invalid configuration: ${issues.join('; ')}`, options);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export type BuildErrorKind = 'AllocationFailed' | 'FormatFailed' | 'FinalizeFailed';

export class BuildError extends Error {
  readonly kind: BuildErrorKind;
  readonly outputPath: string;

  constructor(kind: BuildErrorKind, outputPath: string, message: string, options?: { cause?: unknown }) {
    super(`${kind}: ${message} (${outputPath})${causeSuffix(options?.cause)}`, options);
    this.name = 'BuildError';
    this.kind = kind;
    this.outputPath = outputPath;
  }
}

export type OrchestrationErrorKind =
  | 'ConnectFailed'
  | 'SystemNotFound'
  | 'DiscoveryFailed'
  | 'NoCompatibleMedia'
  | 'EjectFailed'
  | 'InsertFailed'
  | 'ResetFailed'
  | 'PostDwellEjectFailed';

export class OrchestrationError extends Error {
  readonly kind: OrchestrationErrorKind;
  readonly step: string;
  readonly resourceId?: string;

  constructor(
    kind: OrchestrationErrorKind,
    step: string,
    message: string,
    options?: { resourceId?: string; cause?: unknown }
  ) {
    const resource = options?.resourceId ? ` [${options.resourceId}]` : '';
    super(`${step}${resource}: ${message}${causeSuffix(options?.cause)}`, { cause: options?.cause });
    this.name = 'OrchestrationError';
    this.kind = kind;
    this.step = step;
    this.resourceId = options?.resourceId;
  }
}

export class ServerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`${message}${causeSuffix(options?.cause)}`, options);
    this.name = 'ServerError';
  }
}

export class ShutdownError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`${message}${causeSuffix(options?.cause)}`, options);
    this.name = 'ShutdownError';
  }
}

function causeSuffix(cause: unknown): string {
  if (cause === undefined) return '';
  return `: ${cause instanceof Error ? cause.message : String(cause)}`;
}
