import path from "node:path"
import type { VariantSpec } from "../types/config.js"
import { isResizeMode } from "./variant-spec.js"

/**
 * Derive the thumbnail path for a key and spec:
 * {dir}/{stem}-w{width}-h{height}-m{mode}{ext}
 *
 * This format ensures:
 * - Determinism: the same request always hits the same file
 * - Injectivity: the suffix is parsed from the right, so no two (key, spec)
 *   pairs share a path
 * - The source extension stays last, so content type and output format
 *   follow from the file name
 */
export function deriveVariantPath(key: string, spec: VariantSpec): string {
  const { dir, name, ext } = path.posix.parse(key)
  const file = `${name}-w${spec.width}-h${spec.height}-m${spec.mode}${ext}`
  return dir ? `${dir}/${file}` : file
}

const VARIANT_SUFFIX = /^(.+)-w(0|[1-9]\d*)-h(0|[1-9]\d*)-m(\d)$/

/**
 * Parse a thumbnail path back into its key and spec
 */
export function parseVariantPath(variantPath: string): { key: string; spec: VariantSpec } | null {
  const { dir, name, ext } = path.posix.parse(variantPath)
  if (!ext) return null

  const match = VARIANT_SUFFIX.exec(name)
  if (!match) return null

  const [, stem, width, height, mode] = match
  if (stem === undefined || width === undefined || height === undefined || mode === undefined) return null

  const parsedMode = Number.parseInt(mode, 10)
  if (!isResizeMode(parsedMode)) return null

  const file = `${stem}${ext}`
  return {
    key: dir ? `${dir}/${file}` : file,
    spec: {
      width: Number.parseInt(width, 10),
      height: Number.parseInt(height, 10),
      mode: parsedMode,
    },
  }
}
