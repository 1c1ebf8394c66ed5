import fs from "node:fs/promises"
import path from "node:path"
import { type ErrorLogger, errorLogger } from "@thumbspace/error-logger"
import { createSingleFlight, type SingleFlight } from "@thumbspace/shared"
import { resolveKeyPath } from "../core/keys.js"
import type { ImageResizer } from "../core/resize.js"
import { deriveVariantPath } from "../core/variant-path.js"
import type { StoredFile, VariantSpec } from "../types/config.js"
import type { HResponse } from "../types/response.js"
import { Rs, StoreError } from "../types/response.js"
import { createTempFile, discardFile, fileExists, openStoredFile } from "./files.js"
import type { SourceStore } from "./source-store.js"

export interface VariantCacheConfig {
  /** Thumbnail root */
  basePath: string
  sources: SourceStore
  resizer: ImageResizer
  /** Deadline for one resize; 0 or unset waits indefinitely */
  buildTimeoutMs?: number
  logger?: ErrorLogger
}

/**
 * On-demand thumbnail cache backed by the filesystem.
 *
 * Per thumbnail path the lifecycle is absent → building → present. A present
 * file is served without touching the build registry. A missing one is built
 * by exactly one caller while every concurrent caller for the same path
 * waits on that build and observes its result. Files appear only through an
 * atomic rename, so readers never see a partial thumbnail, and a failed build
 * leaves nothing behind: the next fetch simply builds again.
 */
export class VariantCache {
  private basePath: string
  private sources: SourceStore
  private resizer: ImageResizer
  private buildTimeoutMs: number
  private logger: ErrorLogger
  private builds: SingleFlight<void>

  constructor(config: VariantCacheConfig) {
    this.basePath = path.resolve(config.basePath)
    this.sources = config.sources
    this.resizer = config.resizer
    this.buildTimeoutMs = config.buildTimeoutMs ?? 0
    this.logger = config.logger ?? errorLogger.child("variant-cache")
    this.builds = createSingleFlight<void>()
  }

  /**
   * Absolute path of the thumbnail for `key` at `spec`
   *
   * @throws StoreError("key:invalid") if the path escapes the cache
   */
  pathFor(key: string, spec: VariantSpec): string {
    return resolveKeyPath(this.basePath, deriveVariantPath(key, spec))
  }

  /**
   * Open the thumbnail, building it first if needed.
   * The caller closes the returned handle.
   */
  async fetch(key: string, spec: VariantSpec): HResponse<StoredFile> {
    try {
      const target = this.pathFor(key, spec)

      this.logger.debug("Open", { key, path: target })
      const cached = await openStoredFile(target)
      if (cached) {
        return Rs.data(cached)
      }

      // The build is shared: it is never cancelled on behalf of one caller
      await this.builds.run(target, () => this.build(key, spec, target))

      const built = await openStoredFile(target)
      if (!built) {
        return Rs.error(`Thumbnail missing after build: ${key}`, "variant:not-found")
      }
      return Rs.data(built)
    } catch (error) {
      return Rs.fromError(error, "io:error")
    }
  }

  /**
   * Number of thumbnails currently being built
   */
  pendingBuilds(): number {
    return this.builds.size()
  }

  private async build(key: string, spec: VariantSpec, target: string): Promise<void> {
    const startedAt = Date.now()

    // Another process, or a build that finished after our open, may have installed it
    if (await fileExists(target)) {
      return
    }

    const source = await this.sources.exists(key)
    if (source.error) {
      throw new StoreError(source.error.message, source.error.code)
    }
    if (!source.data) {
      throw new StoreError(`Source not found: ${key}`, "source:not-found")
    }
    const sourcePath = this.sources.pathFor(key)

    const dir = path.dirname(target)
    let tempPath: string
    try {
      await fs.mkdir(dir, { recursive: true })
      const temp = await createTempFile(target)
      tempPath = temp.path
      await temp.handle.close()
    } catch (error) {
      throw StoreError.wrap(error, "build:failed", "Failed to prepare thumbnail")
    }

    try {
      await this.runResize(tempPath, sourcePath, spec)
      await fs.rename(tempPath, target)
    } catch (error) {
      await this.discardTemp(tempPath)
      const failure = StoreError.wrap(error, "build:failed", "Failed to create thumbnail")
      this.logger.error("Thumbnail build failed", failure, { key, path: target })
      throw failure
    }

    this.logger.info("Thumbnail built", {
      key,
      path: target,
      width: spec.width,
      height: spec.height,
      mode: spec.mode,
      durationMs: Date.now() - startedAt,
    })
  }

  private async runResize(tempPath: string, sourcePath: string, spec: VariantSpec): Promise<void> {
    const resizing = this.resizer.resize(tempPath, sourcePath, spec)
    if (this.buildTimeoutMs <= 0) {
      return resizing
    }

    const timeoutMs = this.buildTimeoutMs
    let timer: NodeJS.Timeout | undefined
    let timedOut = false
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true
        reject(new StoreError(`Thumbnail build timed out after ${timeoutMs} ms`, "build:failed"))
      }, timeoutMs)
    })

    try {
      await Promise.race([resizing, deadline])
    } catch (error) {
      if (timedOut) {
        // The abandoned resize may still write into the temp file
        void resizing.catch(() => undefined).then(() => this.discardTemp(tempPath))
      }
      throw error
    } finally {
      clearTimeout(timer)
    }
  }

  private async discardTemp(tempPath: string): Promise<void> {
    const error = await discardFile(tempPath)
    if (error) {
      this.logger.warn("Failed to remove temp file", error, { path: tempPath })
    }
  }
}
