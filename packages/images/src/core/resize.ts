import path from "node:path"
import sharp from "sharp"
import type { ResizeMode, VariantSpec } from "../types/config.js"

/**
 * Produces a resized copy of `sourcePath` at `destinationPath`.
 *
 * The destination is always a private temp file owned by the caller; an
 * implementation that fails may leave it behind, the caller discards it.
 * The output format follows the destination's extension.
 */
export interface ImageResizer {
  resize(destinationPath: string, sourcePath: string, spec: VariantSpec): Promise<void>
}

export interface SharpResizerOptions {
  /** Encoder quality for lossy formats */
  quality?: number
}

const FIT_BY_MODE: Record<ResizeMode, keyof sharp.FitEnum> = {
  1: "inside",
  2: "cover",
  3: "fill",
}

const FORMAT_BY_EXTENSION: Record<string, keyof sharp.FormatEnum> = {
  ".jpg": "jpeg",
  ".jpeg": "jpeg",
  ".png": "png",
  ".webp": "webp",
  ".gif": "gif",
  ".avif": "avif",
  ".tif": "tiff",
  ".tiff": "tiff",
}

const LOSSY_FORMATS = new Set<keyof sharp.FormatEnum>(["jpeg", "webp", "avif", "tiff"])

/**
 * ImageResizer backed by sharp (libvips).
 *
 * Reads the first frame only, applies EXIF orientation, drops metadata.
 */
export class SharpImageResizer implements ImageResizer {
  private readonly quality: number

  constructor(options: SharpResizerOptions = {}) {
    this.quality = options.quality ?? 75
  }

  async resize(destinationPath: string, sourcePath: string, spec: VariantSpec): Promise<void> {
    const extension = path.extname(destinationPath).toLowerCase()
    const format = FORMAT_BY_EXTENSION[extension]
    if (!format) {
      throw new Error(`Unsupported thumbnail format: ${extension || "(none)"}`)
    }

    await sharp(sourcePath, { pages: 1 })
      .rotate()
      .resize({
        width: spec.width > 0 ? spec.width : undefined,
        height: spec.height > 0 ? spec.height : undefined,
        fit: FIT_BY_MODE[spec.mode],
        position: "centre",
      })
      .toFormat(format, LOSSY_FORMATS.has(format) ? { quality: this.quality } : {})
      .toFile(destinationPath)
  }

  /**
   * Library versions for the startup log
   */
  static describe(): string {
    return `libvips ${sharp.versions.vips}`
  }
}
