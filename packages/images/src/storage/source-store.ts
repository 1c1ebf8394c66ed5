import type { FileHandle } from "node:fs/promises"
import fs from "node:fs/promises"
import path from "node:path"
import { type ErrorLogger, errorLogger } from "@thumbspace/error-logger"
import { isAlreadyExistsError } from "@thumbspace/shared"
import { type ContentHasher, createContentHasher } from "../core/hash.js"
import { resolveKeyPath } from "../core/keys.js"
import type { CreateSourceResult, StoredFile } from "../types/config.js"
import type { HResponse } from "../types/response.js"
import { Rs, StoreError } from "../types/response.js"
import { formatSizeLimit, MAX_UPLOAD_SIZE } from "../validation/size-limits.js"
import { createTempFile, discardFile, fileExists, openStoredFile, type TempFile } from "./files.js"

export interface SourceStoreConfig {
  basePath: string
  /** Write `<file>.md5` next to every new source */
  writeChecksums?: boolean
  /** Upload limit applied when `create` is not given one */
  maxBytes?: number
  logger?: ErrorLogger
}

export interface CreateSourceOptions {
  maxBytes?: number
}

/**
 * Create-once storage for original assets, laid out as `<basePath>/<key>`.
 *
 * Keys must already be validated with `validateKey`.
 */
export class SourceStore {
  private basePath: string
  private writeChecksums: boolean
  private maxBytes: number
  private logger: ErrorLogger

  constructor(config: SourceStoreConfig) {
    this.basePath = path.resolve(config.basePath)
    this.writeChecksums = config.writeChecksums ?? true
    this.maxBytes = config.maxBytes ?? MAX_UPLOAD_SIZE
    this.logger = config.logger ?? errorLogger.child("source-store")
  }

  /**
   * Absolute path of the source for `key`
   *
   * @throws StoreError("key:invalid") if the key escapes the store
   */
  pathFor(key: string): string {
    return resolveKeyPath(this.basePath, key)
  }

  /**
   * Store a new source. Never overwrites: a second create for the same key
   * fails with `source:exists`, so a concurrent reader never sees the file
   * replaced under it.
   *
   * The body is streamed into a hidden temp file and hard-linked onto the key
   * only once complete, so nothing is visible at the key mid-upload.
   */
  async create(
    key: string,
    body: AsyncIterable<Uint8Array>,
    options: CreateSourceOptions = {},
  ): HResponse<CreateSourceResult> {
    const maxBytes = options.maxBytes ?? this.maxBytes

    let target: string
    let temp: TempFile
    try {
      target = this.pathFor(key)

      // Early answer only; the link below decides
      if (await fileExists(target)) {
        return Rs.error(`Source already exists: ${key}`, "source:exists")
      }

      // Ensure directory exists
      await fs.mkdir(path.dirname(target), { recursive: true })

      temp = await createTempFile(target)
    } catch (error) {
      return Rs.fromError(error, "io:error")
    }

    const hasher = this.writeChecksums ? createContentHasher() : null
    let bytesWritten = 0
    try {
      try {
        this.logger.debug("Write file", { key, path: temp.path })
        bytesWritten = await this.copyBody(body, temp.handle, maxBytes, hasher)
      } finally {
        await temp.handle.close()
      }
    } catch (error) {
      await this.discardTemp(temp.path, key)
      return Rs.fromError(error, "io:error")
    }

    const installed = await this.installExclusive(temp.path, target)
    if (installed.error) {
      if (isAlreadyExistsError(installed.error)) {
        return Rs.error(`Source already exists: ${key}`, "source:exists")
      }
      return Rs.fromError(installed.error, "io:error")
    }

    if (!hasher) {
      return Rs.data({ bytesWritten, checksum: null })
    }

    const checksum = hasher.digest()
    const recorded = await this.writeChecksumFile(target, checksum, key)
    return Rs.data({ bytesWritten, checksum: recorded ? checksum : null })
  }

  /**
   * Open a stored source for reading; the caller closes the handle
   */
  async open(key: string): HResponse<StoredFile> {
    try {
      const target = this.pathFor(key)
      this.logger.debug("Open", { key, path: target })

      const file = await openStoredFile(target)
      if (!file) {
        return Rs.error(`Source not found: ${key}`, "source:not-found")
      }
      return Rs.data(file)
    } catch (error) {
      return Rs.fromError(error, "io:error")
    }
  }

  async exists(key: string): HResponse<boolean> {
    try {
      return Rs.data(await fileExists(this.pathFor(key)))
    } catch (error) {
      return Rs.fromError(error, "io:error")
    }
  }

  /**
   * Hard-link `tempPath` onto `target`, failing with EEXIST if anything is
   * already there, then drop the temp name.
   */
  private async installExclusive(tempPath: string, target: string): Promise<{ error: unknown }> {
    try {
      this.logger.debug("Install file", { path: target })
      await fs.link(tempPath, target)
      return { error: null }
    } catch (error) {
      return { error }
    } finally {
      await this.discardTemp(tempPath)
    }
  }

  /**
   * Write `<file>.md5` the same way as the source itself.
   * The source is already installed at this point, so a failure only costs
   * the checksum: it is logged and reported as `checksum: null`.
   */
  private async writeChecksumFile(target: string, checksum: string, key: string): Promise<boolean> {
    const checksumPath = `${target}.md5`
    let pendingTemp: string | null = null
    try {
      const temp = await createTempFile(checksumPath)
      pendingTemp = temp.path
      try {
        await temp.handle.writeFile(checksum)
      } finally {
        await temp.handle.close()
      }

      this.logger.debug("Write checksum file", { key, path: checksumPath, md5: checksum })
      pendingTemp = null
      const installed = await this.installExclusive(temp.path, checksumPath)
      if (installed.error) {
        throw installed.error
      }
      return true
    } catch (error) {
      if (pendingTemp) {
        await this.discardTemp(pendingTemp, key)
      }
      this.logger.warn("Failed to write checksum file", error, { key, path: checksumPath })
      return false
    }
  }

  private async discardTemp(tempPath: string, key?: string): Promise<void> {
    const error = await discardFile(tempPath)
    if (error) {
      this.logger.warn("Failed to remove temp file", error, { key, path: tempPath })
    }
  }

  private async copyBody(
    body: AsyncIterable<Uint8Array>,
    handle: FileHandle,
    maxBytes: number,
    hasher: ContentHasher | null,
  ): Promise<number> {
    let total = 0
    for await (const chunk of body) {
      total += chunk.byteLength
      if (total > maxBytes) {
        throw new StoreError(`Upload too large. Maximum size: ${formatSizeLimit(maxBytes)}`, "source:too-large")
      }
      hasher?.update(chunk)

      let offset = 0
      while (offset < chunk.byteLength) {
        const { bytesWritten } = await handle.write(chunk, offset)
        offset += bytesWritten
      }
    }
    return total
  }
}
