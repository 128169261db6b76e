export type MediaChronicleErrorCode =
  | 'invalid-timestamp'
  | 'rename-group-failed'
  | 'store-format'

export class MediaChronicleError extends Error {
  constructor(readonly code: MediaChronicleErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** A user-entered date string that does not describe a real calendar time. */
export class InvalidTimestampError extends MediaChronicleError {
  constructor(readonly input: string) {
    super('invalid-timestamp', `Invalid date/time "${input}". Expected YYYY/MM/DD HH:MM:SS`)
  }
}

/** A duplicate-name group could not be renamed; renames already done were undone. */
export class RenameGroupError extends MediaChronicleError {
  constructor(readonly fileName: string, cause: unknown) {
    super('rename-group-failed', `Renaming the "${fileName}" group failed and was rolled back`, { cause })
  }
}

export class StoreFormatError extends MediaChronicleError {
  constructor(readonly path: string, detail: string) {
    super('store-format', `Collection file ${path} is not usable: ${detail}`)
  }
}

/**
 * Extract a message suitable for showing to the person using the collection.
 */
export function describeError(error: unknown): string {
  if (error instanceof MediaChronicleError) return error.message
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined
    if (code === 'ENOENT') return 'File not found'
    if (code === 'EACCES' || code === 'EPERM') return 'Permission denied'
    return error.message
  }
  return 'Unexpected error'
}
