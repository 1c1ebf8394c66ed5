/**
 * Error classification helpers.
 *
 * Filesystem calls reject with NodeJS.ErrnoException values; callers branch on
 * the errno code rather than on message text.
 */

/**
 * Errno codes meaning "the file is not there".
 * ENOTDIR shows up when a path component is a regular file.
 */
const NOT_FOUND_CODES = new Set(["ENOENT", "ENOTDIR"])

/**
 * Fatal error codes that should cause immediate process exit.
 */
const FATAL_ERROR_CODES = new Set(["ERR_OUT_OF_MEMORY", "ERR_WORKER_OUT_OF_MEMORY", "EMFILE", "ENOSPC"])

/**
 * Extract error code from an error object.
 * Handles Node.js style errors with 'code' property.
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") {
    return undefined
  }
  if ("code" in err && typeof err.code === "string") {
    return err.code
  }
  return undefined
}

function getErrorCause(err: unknown): unknown {
  if (!err || typeof err !== "object") {
    return undefined
  }
  return "cause" in err ? err.cause : undefined
}

function extractErrorCodeWithCause(err: unknown): string | undefined {
  return extractErrorCode(err) ?? extractErrorCode(getErrorCause(err))
}

/**
 * True when a filesystem call failed because the path does not exist.
 */
export function isNotFoundError(err: unknown): boolean {
  const code = extractErrorCode(err)
  return code !== undefined && NOT_FOUND_CODES.has(code)
}

/**
 * True when an exclusive create (`wx`) or a link hit an existing file.
 */
export function isAlreadyExistsError(err: unknown): boolean {
  return extractErrorCode(err) === "EEXIST"
}

/**
 * Checks if an error is a fatal error that should cause process exit.
 */
export function isFatalError(err: unknown): boolean {
  const code = extractErrorCodeWithCause(err)
  return code !== undefined && FATAL_ERROR_CODES.has(code)
}

/**
 * One-line message for an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  if (typeof err === "string") {
    return err
  }
  return String(err)
}
