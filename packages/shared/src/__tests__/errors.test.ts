import { describe, expect, it } from "vitest"
import {
  errorMessage,
  extractErrorCode,
  isAlreadyExistsError,
  isFatalError,
  isNotFoundError,
} from "../errors.js"

function errno(code: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`${code}: failed`)
  err.code = code
  return err
}

describe("extractErrorCode", () => {
  it("should extract code from error with code property", () => {
    expect(extractErrorCode(errno("ENOENT"))).toBe("ENOENT")
  })

  it("should return undefined for null/undefined", () => {
    expect(extractErrorCode(null)).toBeUndefined()
    expect(extractErrorCode(undefined)).toBeUndefined()
  })

  it("should return undefined for non-string code", () => {
    expect(extractErrorCode({ code: 123 })).toBeUndefined()
  })
})

describe("isNotFoundError", () => {
  it("should detect ENOENT and ENOTDIR", () => {
    expect(isNotFoundError(errno("ENOENT"))).toBe(true)
    expect(isNotFoundError(errno("ENOTDIR"))).toBe(true)
  })

  it("should return false for other errors", () => {
    expect(isNotFoundError(errno("EACCES"))).toBe(false)
    expect(isNotFoundError(new Error("ENOENT"))).toBe(false)
  })
})

describe("isAlreadyExistsError", () => {
  it("should detect EEXIST only", () => {
    expect(isAlreadyExistsError(errno("EEXIST"))).toBe(true)
    expect(isAlreadyExistsError(errno("ENOENT"))).toBe(false)
  })
})

describe("isFatalError", () => {
  it("should detect fatal codes directly and in cause", () => {
    expect(isFatalError(errno("ENOSPC"))).toBe(true)
    expect(isFatalError({ cause: { code: "ERR_OUT_OF_MEMORY" } })).toBe(true)
    expect(isFatalError(errno("ENOENT"))).toBe(false)
  })
})

describe("errorMessage", () => {
  it("should read Error messages and stringify the rest", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom")
    expect(errorMessage("plain")).toBe("plain")
    expect(errorMessage(42)).toBe("42")
  })
})
