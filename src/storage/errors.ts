/**
 * Storage Errors
 *
 * Thrown by the filesystem-backed stores. Kept separate from LlmError so a
 * failed cache write can never be mistaken for a provider failure.
 */

export type StorageErrorKind = 'read_failed' | 'write_failed' | 'corrupted'

export class StorageError extends Error {
  constructor(
    readonly kind: StorageErrorKind,
    readonly path: string,
    cause?: unknown
  ) {
    super(`${describe(kind)}: ${path}${causeSuffix(cause)}`, { cause })
    this.name = 'StorageError'
  }
}

function describe(kind: StorageErrorKind): string {
  switch (kind) {
    case 'read_failed':
      return 'Failed to read'
    case 'write_failed':
      return 'Failed to write'
    case 'corrupted':
      return 'Corrupted entry'
  }
}

function causeSuffix(cause: unknown): string {
  if (cause instanceof Error) return ` (${cause.message})`
  if (typeof cause === 'string') return ` (${cause})`
  return ''
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}
