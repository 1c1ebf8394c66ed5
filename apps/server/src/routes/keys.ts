import type { ErrorLogger } from "@thumbspace/error-logger"
import { validateKey } from "@thumbspace/images"
import type { HttpError } from "../lib/http-errors.js"

/**
 * Validate the key addressed by `path` below `prefix` (e.g. "/source/").
 * Surrounding whitespace is not part of a key.
 */
export function keyFromPath(
  path: string,
  prefix: string,
  allowedExtensions: readonly string[],
  logger: ErrorLogger,
): { key: string; error: null } | { key: null; error: HttpError } {
  const raw = (path.startsWith(prefix) ? path.slice(prefix.length) : "").trim()

  const result = validateKey(raw, allowedExtensions)
  if (!result.valid) {
    logger.warn("Invalid key", undefined, { key: raw, reason: result.error })
    return { key: null, error: { message: result.error, code: "key:invalid" } }
  }
  return { key: result.key, error: null }
}
