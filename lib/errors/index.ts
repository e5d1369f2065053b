/**
 * Custom error classes for the database builder
 */

export type PreconditionKind = 'database-exists' | 'archive-count-mismatch'

export class ValidationError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class PreconditionError extends Error {
  constructor(message: string, public readonly kind: PreconditionKind) {
    super(message)
    this.name = 'PreconditionError'
  }
}

export class ArchiveError extends Error {
  constructor(
    message: string,
    public readonly archivePath: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'ArchiveError'
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly sql?: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'DatabaseError'
  }
}

export class CSVParsingError extends Error {
  constructor(
    message: string,
    public readonly filename?: string,
    public readonly lineNumber?: number
  ) {
    super(message)
    this.name = 'CSVParsingError'
  }
}

export class PortalError extends Error {
  constructor(message: string, public readonly statusCode?: number) {
    super(message)
    this.name = 'PortalError'
  }
}

export class DownloadError extends Error {
  constructor(message: string, public readonly statusCode?: number) {
    super(message)
    this.name = 'DownloadError'
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Log error with context
 */
export function logError(error: Error, context?: Record<string, unknown>): void {
  console.error({
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
    context,
    timestamp: new Date().toISOString(),
  })
}

/**
 * Format error message for operator display
 */
export function formatUserError(error: Error): string {
  if (error instanceof ValidationError) {
    return `Invalid input: ${error.message}`
  }
  if (error instanceof PreconditionError) {
    return `Cannot start: ${error.message}`
  }
  if (error instanceof ArchiveError) {
    return `Archive error: ${error.message} (${error.archivePath})`
  }
  if (error instanceof DatabaseError) {
    const statement = error.sql ? ` while running: ${error.sql.replace(/\s+/g, ' ').trim()}` : ''
    return `Database error: ${error.message}${statement}`
  }
  if (error instanceof CSVParsingError) {
    return `CSV parsing error: ${error.message}${
      error.filename ? ` in ${error.filename}` : ''
    }${error.lineNumber ? ` at line ${error.lineNumber}` : ''}`
  }
  if (error instanceof PortalError) {
    return `Open data portal error: ${error.message}`
  }
  if (error instanceof DownloadError) {
    return `Download error: ${error.message}`
  }
  return `An error occurred: ${error.message}`
}
