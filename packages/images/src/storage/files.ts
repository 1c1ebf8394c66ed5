import crypto from "node:crypto"
import type { FileHandle } from "node:fs/promises"
import fs from "node:fs/promises"
import path from "node:path"
import { isNotFoundError } from "@thumbspace/shared"
import type { StoredFile } from "../types/config.js"

/**
 * Open a stored file for reading.
 *
 * @returns null when nothing (or something other than a regular file) is at `filePath`
 */
export async function openStoredFile(filePath: string): Promise<StoredFile | null> {
  let handle: FileHandle
  try {
    handle = await fs.open(filePath, "r")
  } catch (error) {
    if (isNotFoundError(error)) return null
    throw error
  }

  try {
    const stats = await handle.stat()
    if (!stats.isFile()) {
      await handle.close()
      return null
    }
    return {
      handle,
      path: filePath,
      size: stats.size,
      modifiedAt: stats.mtime,
      extension: path.extname(filePath),
    }
  } catch (error) {
    await handle.close()
    throw error
  }
}

/**
 * stat-based existence check; errors other than "not found" propagate
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath)
    return stats.isFile()
  } catch (error) {
    if (isNotFoundError(error)) return false
    throw error
  }
}

/**
 * Best-effort removal of a temp or partial file
 *
 * @returns the error if removal failed for a reason other than "already gone"
 */
export async function discardFile(filePath: string): Promise<unknown> {
  try {
    await fs.unlink(filePath)
    return null
  } catch (error) {
    return isNotFoundError(error) ? null : error
  }
}

export interface TempFile {
  path: string
  handle: FileHandle
}

/**
 * Exclusively create a uniquely named, hidden temp file beside `target`:
 * `.<name>.<16 hex>.tmp<ext>`. Same directory means same filesystem, so the
 * final rename or link onto `target` is atomic. The extension stays last so
 * the output format can still be read from it. The caller closes the handle.
 */
export async function createTempFile(target: string): Promise<TempFile> {
  const ext = path.extname(target)
  const suffix = crypto.randomBytes(8).toString("hex")
  const tempPath = path.join(path.dirname(target), `.${path.basename(target, ext)}.${suffix}.tmp${ext}`)

  const handle = await fs.open(tempPath, "wx", 0o644)
  return { path: tempPath, handle }
}
