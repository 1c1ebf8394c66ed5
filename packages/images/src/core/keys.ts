import path from "node:path"
import { resolveAndValidatePath } from "@thumbspace/shared"
import { StoreError } from "../types/response.js"

/**
 * Characters a key may contain. Necessary but not sufficient:
 * `.` and `/` still combine into traversal sequences, checked separately.
 */
const KEY_PATTERN = /^[A-Za-z0-9/._-]+$/

export const MAX_KEY_LENGTH = 1024

export type KeyValidationResult = { valid: true; key: string } | { valid: false; error: string }

function invalid(error: string): KeyValidationResult {
  return { valid: false, error }
}

/**
 * Validate a request path as a storage key.
 *
 * A key is a normalized relative POSIX path: `a/b/photo.jpg`.
 * It must equal its own normalized form, so `a//b.jpg`, `./a.jpg` and
 * `a/./b.jpg` are all rejected rather than silently rewritten.
 *
 * @param allowedExtensions - Exact extensions including the dot, e.g. `[".jpg", ".png"]`
 */
export function validateKey(raw: string, allowedExtensions: readonly string[]): KeyValidationResult {
  if (raw === "") {
    return invalid("empty key")
  }
  if (raw.length > MAX_KEY_LENGTH) {
    return invalid(`key longer than ${MAX_KEY_LENGTH} characters`)
  }
  if (!KEY_PATTERN.test(raw)) {
    return invalid("invalid characters in key")
  }

  const normalized = path.posix.normalize(raw)
  if (
    normalized !== raw ||
    normalized === "." ||
    normalized.startsWith("/") ||
    normalized.endsWith("/") ||
    normalized.includes("..")
  ) {
    return invalid(`invalid key: ${raw}`)
  }

  const ext = path.posix.extname(raw)
  if (ext === "") {
    return invalid(`no extension: ${raw}`)
  }
  if (!allowedExtensions.includes(ext)) {
    return invalid(`extension not allowed: ${raw}`)
  }

  return { valid: true, key: raw }
}

/**
 * Join a validated relative path onto a storage root.
 *
 * @throws StoreError("key:invalid") if the result escapes the root
 */
export function resolveKeyPath(root: string, relativePath: string): string {
  const result = resolveAndValidatePath(relativePath.split("/").join(path.sep), root)
  if (!result.valid) {
    throw new StoreError(`${result.error ?? "Invalid path"}: ${relativePath}`, "key:invalid")
  }
  return result.resolvedPath
}
