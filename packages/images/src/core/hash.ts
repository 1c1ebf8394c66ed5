import crypto from "node:crypto"

export interface ContentHasher {
  update: (chunk: Uint8Array) => void
  /** Lowercase hex digest; call once, after the last chunk */
  digest: () => string
}

/**
 * Incremental MD5 of an upload, stored next to the source as `<file>.md5`.
 * Integrity only, never used as an identity.
 */
export function createContentHasher(): ContentHasher {
  const hash = crypto.createHash("md5")
  return {
    update: chunk => {
      hash.update(chunk)
    },
    digest: () => hash.digest("hex"),
  }
}
