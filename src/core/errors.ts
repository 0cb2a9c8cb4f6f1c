/**
 * Error taxonomy for scans.
 *
 * Setup errors (config, wordlist, proxy, resolvers) are thrown to the caller
 * before any worker starts. Per-candidate errors (resolution, takeover probe)
 * never cross the task boundary.
 */

export type ScanErrorCode =
  | 'CONFIG_INVALID'
  | 'WORDLIST_LOAD'
  | 'PROXY_CONFIG'
  | 'RESOLVER_CONFIG'
  | 'RESOLUTION_FAILED'
  | 'TAKEOVER_PROBE';

export class ScanError extends Error {
  readonly code: ScanErrorCode;
  readonly fatal: boolean;

  constructor(code: ScanErrorCode, message: string, options: { cause?: unknown; fatal?: boolean } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.fatal = options.fatal ?? true;
  }
}

export class ConfigError extends ScanError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export class WordlistLoadError extends ScanError {
  readonly source: string;

  constructor(source: string, cause?: unknown) {
    super('WORDLIST_LOAD', `Failed to load wordlist ${source}: ${describeError(cause)}`, { cause });
    this.source = source;
  }
}

export class ProxyConfigError extends ScanError {
  readonly proxy: string;

  constructor(proxy: string, reason: string) {
    super('PROXY_CONFIG', `Invalid proxy URL "${proxy}": ${reason}`);
    this.proxy = proxy;
  }
}

export class ResolverConfigError extends ScanError {
  constructor(message: string, cause?: unknown) {
    super('RESOLVER_CONFIG', message, { cause });
  }
}

export type ResolutionFailureKind = 'negative' | 'transport';

/**
 * No configured resolver produced an answer for a hostname
 */
export class ResolutionFailure extends ScanError {
  readonly hostname: string;
  readonly kind: ResolutionFailureKind;

  constructor(hostname: string, kind: ResolutionFailureKind, cause?: unknown) {
    super('RESOLUTION_FAILED', `Could not resolve ${hostname}: ${describeError(cause)}`, {
      cause,
      fatal: false,
    });
    this.hostname = hostname;
    this.kind = kind;
  }
}

export class TakeoverProbeError extends ScanError {
  readonly hostname: string;

  constructor(hostname: string, cause?: unknown) {
    super('TAKEOVER_PROBE', `Takeover probe failed for ${hostname}: ${describeError(cause)}`, {
      cause,
      fatal: false,
    });
    this.hostname = hostname;
  }
}

export function isFatalScanError(error: unknown): error is ScanError {
  return error instanceof ScanError && error.fatal;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error === undefined) {
    return 'unknown error';
  }
  return String(error);
}
