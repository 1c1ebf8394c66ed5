import type { FileHandle } from "node:fs/promises"
import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { Readable } from "node:stream"
import { createErrorLogger } from "@thumbspace/error-logger"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { SourceStore } from "../storage/source-store.js"

const silent = createErrorLogger({ sink: () => {} })

function body(...parts: string[]): Readable {
  return Readable.from(parts.map(part => Buffer.from(part)))
}

async function readAll(file: { handle: FileHandle }): Promise<string> {
  try {
    return (await file.handle.readFile()).toString()
  } finally {
    await file.handle.close()
  }
}

describe("SourceStore", () => {
  let store: SourceStore
  let tempDir: string

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "source-store-test-"))
    store = new SourceStore({ basePath: tempDir, logger: silent })
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  describe("create", () => {
    it("should store the body and create parent directories", async () => {
      const result = await store.create("a/b/photo.jpg", body("hello ", "world"))

      expect(result).toEqual({
        data: { bytesWritten: 11, checksum: "5eb63bbbe01eeed093cb22bb8f5acdc3" },
        error: null,
      })
      expect(await fs.readFile(path.join(tempDir, "a/b/photo.jpg"), "utf8")).toBe("hello world")
    })

    it("should write the checksum sidecar", async () => {
      await store.create("photo.jpg", body("hello"))

      expect(await fs.readFile(path.join(tempDir, "photo.jpg.md5"), "utf8")).toBe("5d41402abc4b2a76b9719d911017c592")
    })

    it("should skip the sidecar when checksums are disabled", async () => {
      const plain = new SourceStore({ basePath: tempDir, writeChecksums: false, logger: silent })

      const result = await plain.create("photo.jpg", body("hello"))

      expect(result).toEqual({ data: { bytesWritten: 5, checksum: null }, error: null })
      await expect(fs.access(path.join(tempDir, "photo.jpg.md5"))).rejects.toThrow()
    })

    it("should refuse to overwrite an existing source", async () => {
      await store.create("photo.jpg", body("first"))

      const second = await store.create("photo.jpg", body("second"))

      expect(second).toEqual({
        data: null,
        error: { message: "Source already exists: photo.jpg", code: "source:exists" },
      })
      expect(await fs.readFile(path.join(tempDir, "photo.jpg"), "utf8")).toBe("first")
    })

    it("should reject oversized bodies and remove the partial file", async () => {
      const result = await store.create("big.jpg", body("12345", "67890"), { maxBytes: 8 })

      expect(result).toEqual({
        data: null,
        error: { message: "Upload too large. Maximum size: 8 bytes", code: "source:too-large" },
      })
      await expect(fs.access(path.join(tempDir, "big.jpg"))).rejects.toThrow()
      expect(await fs.readdir(tempDir)).toEqual([])

      const retry = await store.create("big.jpg", body("1234"), { maxBytes: 8 })
      expect(retry.error).toBeNull()
    })

    it("should remove the partial file when the body fails mid-stream", async () => {
      async function* failing() {
        yield Buffer.from("partial")
        throw new Error("client went away")
      }

      const result = await store.create("photo.jpg", failing())

      expect(result).toEqual({ data: null, error: { message: "client went away", code: "io:error" } })
      await expect(fs.access(path.join(tempDir, "photo.jpg"))).rejects.toThrow()
      expect(await fs.readdir(tempDir)).toEqual([])
    })

    it("should keep the key absent until the whole body has arrived", async () => {
      let finish: () => void = () => {}
      const rest = new Promise<void>(resolve => {
        finish = resolve
      })
      async function* slow() {
        yield Buffer.from("HALF")
        await rest
        yield Buffer.from("-REST")
      }

      const pending = store.create("photo.jpg", slow())
      await vi.waitFor(async () => {
        expect(await fs.readdir(tempDir)).toHaveLength(1)
      })

      expect(await store.exists("photo.jpg")).toEqual({ data: false, error: null })
      expect((await store.open("photo.jpg")).error?.code).toBe("source:not-found")

      finish()
      expect((await pending).error).toBeNull()

      const opened = await store.open("photo.jpg")
      if (opened.error) throw new Error(opened.error.message)
      expect(await readAll(opened.data)).toBe("HALF-REST")
      expect((await fs.readdir(tempDir)).sort()).toEqual(["photo.jpg", "photo.jpg.md5"])
    })

    it("should let exactly one of two concurrent creates win", async () => {
      const results = await Promise.all([
        store.create("photo.jpg", body("first")),
        store.create("photo.jpg", body("second")),
      ])

      const winners = results.filter(result => result.error === null)
      const losers = results.filter(result => result.error?.code === "source:exists")
      expect(winners).toHaveLength(1)
      expect(losers).toHaveLength(1)

      const stored = await fs.readFile(path.join(tempDir, "photo.jpg"), "utf8")
      expect(["first", "second"]).toContain(stored)
      expect((await fs.readdir(tempDir)).sort()).toEqual(["photo.jpg", "photo.jpg.md5"])
    })

    it("should report a file in the way of the parent directory as an IO error", async () => {
      await store.create("a.jpg", body("hello"))

      const result = await store.create("a.jpg/b.jpg", body("nested"))

      expect(result.error?.code).toBe("io:error")
      expect(await fs.readFile(path.join(tempDir, "a.jpg"), "utf8")).toBe("hello")
    })

    it("should keep the source and report no checksum when the sidecar cannot be written", async () => {
      await fs.mkdir(path.join(tempDir, "photo.jpg.md5"))

      const result = await store.create("photo.jpg", body("hello"))

      expect(result).toEqual({ data: { bytesWritten: 5, checksum: null }, error: null })
      expect(await fs.readFile(path.join(tempDir, "photo.jpg"), "utf8")).toBe("hello")
      expect((await fs.readdir(tempDir)).sort()).toEqual(["photo.jpg", "photo.jpg.md5"])
    })

    it("should accept an empty body", async () => {
      const result = await store.create("empty.jpg", body())

      expect(result).toEqual({
        data: { bytesWritten: 0, checksum: "d41d8cd98f00b204e9800998ecf8427e" },
        error: null,
      })
    })
  })

  describe("open", () => {
    it("should open stored sources with their metadata", async () => {
      await store.create("a/photo.jpg", body("hello"))

      const result = await store.open("a/photo.jpg")
      if (result.error) throw new Error(result.error.message)

      expect(result.data.size).toBe(5)
      expect(result.data.extension).toBe(".jpg")
      expect(result.data.path).toBe(path.join(tempDir, "a", "photo.jpg"))
      expect(await readAll(result.data)).toBe("hello")
    })

    it("should report missing sources as not found", async () => {
      const result = await store.open("x/y.jpg")

      expect(result).toEqual({ data: null, error: { message: "Source not found: x/y.jpg", code: "source:not-found" } })
    })

    it("should treat a directory at the key as not found", async () => {
      await fs.mkdir(path.join(tempDir, "dir.jpg"))

      const result = await store.open("dir.jpg")

      expect(result.error?.code).toBe("source:not-found")
    })
  })

  describe("exists", () => {
    it("should report presence", async () => {
      await store.create("photo.jpg", body("hello"))

      expect(await store.exists("photo.jpg")).toEqual({ data: true, error: null })
      expect(await store.exists("other.jpg")).toEqual({ data: false, error: null })
    })
  })

  describe("pathFor", () => {
    it("should refuse paths outside the store", async () => {
      const result = await store.open("../escape.jpg")

      expect(result.error?.code).toBe("key:invalid")
    })
  })
})
