export class KindedError<K extends string> extends Error {
  constructor(
    readonly kind: K,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

export type LoginErrorKind = 'BadCredentials' | 'NotFound' | 'ApiError' | 'Unreachable'
export class LoginError extends KindedError<LoginErrorKind> {}

export type CatalogErrorKind = 'NeedsRelogin' | 'NotFound' | 'ApiError' | 'Unreachable' | 'InvalidResponse'
export class CatalogError extends KindedError<CatalogErrorKind> {}

export type ReconcileErrorKind = 'PatchTargetMissing'
export class ReconcileError extends KindedError<ReconcileErrorKind> {}

export type ArchiveErrorKind = 'ArchiveError' | 'IoError'
export class ArchiveExtractError extends KindedError<ArchiveErrorKind> {}

export type DownloadErrorKind =
  | 'RequestFailed'
  | 'NeedsRelogin'
  | 'NotFound'
  | 'ApiError'
  | 'EmptyResponse'
  | 'ArchiveError'
  | 'IoError'
  | 'InsufficientSpace'
  | 'Cancelled'
export class DownloadError extends KindedError<DownloadErrorKind> {}

export type ConfigErrorKind = 'Unreadable' | 'Invalid' | 'ReleaseNotFound' | 'AccountNotFound'
export class ConfigError extends KindedError<ConfigErrorKind> {}

export type CoordinationErrorKind = 'Usage' | 'LockIo' | 'ForwardFailed' | 'PrimaryGone'
export class CoordinationError extends KindedError<CoordinationErrorKind> {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Node system errors carry a string `code` (ENOENT, EACCES, ...). */
export function isSystemError(err: unknown): err is NodeJS.ErrnoException & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
}

export function toDownloadError(err: unknown): DownloadError {
  if (err instanceof DownloadError) return err
  if (err instanceof ArchiveExtractError) return new DownloadError(err.kind, err.message, { cause: err })
  if (err instanceof Error && err.name === 'AbortError') {
    return new DownloadError('Cancelled', 'Download cancelled', { cause: err })
  }
  if (isSystemError(err)) return new DownloadError('IoError', err.message, { cause: err })
  return new DownloadError('RequestFailed', errorMessage(err), { cause: err })
}

export function describeDownloadError(err: DownloadError): string {
  switch (err.kind) {
    case 'EmptyResponse':
      return 'received empty response from server'
    case 'RequestFailed':
      return `request error: ${err.message}`
    case 'NeedsRelogin':
      return 'session expired, log in again'
    case 'NotFound':
      return 'release not found on server'
    case 'ApiError':
      return `server error: ${err.message}`
    case 'ArchiveError':
      return `archive error: ${err.message}`
    case 'IoError':
      return `IO error: ${err.message}`
    case 'InsufficientSpace':
      return err.message
    case 'Cancelled':
      return 'download cancelled'
  }
}

export type LaunchErrorKind = 'ExecutableMissing' | 'SpawnFailed'
export class LaunchError extends KindedError<LaunchErrorKind> {}
