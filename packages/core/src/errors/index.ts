/**
 * Custom Error Classes
 */

/**
 * Base error class for all cruise-packager errors
 */
export class PackagerError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PackagerError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Upstream cruise identifier could not be obtained
 */
export class LookupError extends PackagerError {
  constructor(url: string, reason: string, cause?: unknown) {
    super(
      `Cruise ID lookup failed: ${reason}`,
      'LOOKUP_ERROR',
      { url, reason },
      { cause }
    );
    this.name = 'LookupError';
  }
}

/**
 * The cruise's source directory does not exist or cannot be listed
 */
export class SourceNotFoundError extends PackagerError {
  constructor(sourceDir: string, cause?: unknown) {
    super(
      `Source directory ${sourceDir} does not exist or cannot be read`,
      'SOURCE_NOT_FOUND',
      { sourceDir },
      { cause }
    );
    this.name = 'SourceNotFoundError';
  }
}

/**
 * Archive creation failed
 */
export class ArchiveError extends PackagerError {
  constructor(destination: string, cause?: unknown) {
    super(
      `Error creating ${destination}: ${describeCause(cause)}`,
      'ARCHIVE_ERROR',
      { destination },
      { cause }
    );
    this.name = 'ArchiveError';
  }
}

/**
 * Checksum computation failed
 */
export class ChecksumError extends PackagerError {
  constructor(filePath: string, cause?: unknown) {
    super(
      `Error computing checksum of ${filePath}: ${describeCause(cause)}`,
      'CHECKSUM_ERROR',
      { filePath },
      { cause }
    );
    this.name = 'ChecksumError';
  }
}

/**
 * Root-level file copy failed
 */
export class CopyError extends PackagerError {
  constructor(source: string, destination: string, cause?: unknown) {
    super(
      `Error copying ${source}: ${describeCause(cause)}`,
      'COPY_ERROR',
      { source, destination },
      { cause }
    );
    this.name = 'CopyError';
  }
}

/**
 * Summary email could not be sent
 */
export class NotificationError extends PackagerError {
  constructor(recipient: string, cause?: unknown) {
    super(
      `Could not send email to ${recipient}: ${describeCause(cause)}`,
      'NOTIFICATION_ERROR',
      { recipient },
      { cause }
    );
    this.name = 'NotificationError';
  }
}

/**
 * Human-readable message for an unknown thrown value
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? 'Unknown error' : String(cause);
}
