import { describe, expect, it } from "vitest"
import { parseVariantSpec } from "../core/variant-spec.js"
import { RESIZE_MODES } from "../types/config.js"

const options = {
  defaultWidth: 300,
  allowedSizes: [
    { width: 300, height: 0 },
    { width: 100, height: 100 },
    { width: 0, height: 120 },
  ],
}

describe("parseVariantSpec", () => {
  it("should fall back to the default width when no size is given", () => {
    expect(parseVariantSpec({}, options)).toEqual({
      valid: true,
      spec: { width: 300, height: 0, mode: RESIZE_MODES.FIT },
    })
    expect(parseVariantSpec({ w: "", h: "" }, options)).toEqual({
      valid: true,
      spec: { width: 300, height: 0, mode: RESIZE_MODES.FIT },
    })
  })

  it("should read width, height and mode", () => {
    expect(parseVariantSpec({ w: "100", h: "100", m: "2" }, options)).toEqual({
      valid: true,
      spec: { width: 100, height: 100, mode: RESIZE_MODES.COVER },
    })
  })

  it("should treat a missing dimension as 0", () => {
    expect(parseVariantSpec({ h: "120", m: "3" }, options)).toEqual({
      valid: true,
      spec: { width: 0, height: 120, mode: RESIZE_MODES.STRETCH },
    })
  })

  it("should reject sizes outside the allow-list", () => {
    expect(parseVariantSpec({ w: "999", h: "999" }, options)).toEqual({
      valid: false,
      error: "thumbnail size not allowed: 999x999",
    })
    expect(parseVariantSpec({ w: "100" }, options)).toEqual({
      valid: false,
      error: "thumbnail size not allowed: 100x0",
    })
  })

  it("should reject malformed dimensions", () => {
    expect(parseVariantSpec({ w: "-100" }, options)).toEqual({ valid: false, error: "invalid width: -100" })
    expect(parseVariantSpec({ w: "1e3" }, options)).toEqual({ valid: false, error: "invalid width: 1e3" })
    expect(parseVariantSpec({ w: "123456" }, options)).toEqual({ valid: false, error: "invalid width: 123456" })
    expect(parseVariantSpec({ h: "12.5" }, options)).toEqual({ valid: false, error: "invalid height: 12.5" })
  })

  it("should reject dimensions with leading zeros", () => {
    expect(parseVariantSpec({ w: "0100", h: "100" }, options)).toEqual({ valid: false, error: "invalid width: 0100" })
    expect(parseVariantSpec({ w: "100", h: "00" }, options)).toEqual({ valid: false, error: "invalid height: 00" })
    expect(parseVariantSpec({ w: "0", h: "120" }, options)).toEqual({
      valid: true,
      spec: { width: 0, height: 120, mode: RESIZE_MODES.FIT },
    })
  })

  it("should reject unknown modes", () => {
    expect(parseVariantSpec({ m: "0" }, options)).toEqual({ valid: false, error: "invalid mode: 0" })
    expect(parseVariantSpec({ m: "4" }, options)).toEqual({ valid: false, error: "invalid mode: 4" })
    expect(parseVariantSpec({ m: "cover" }, options)).toEqual({ valid: false, error: "invalid mode: cover" })
  })

  it("should reject 0x0", () => {
    expect(parseVariantSpec({ w: "0", h: "0" }, options)).toEqual({
      valid: false,
      error: "width and height cannot both be 0",
    })
  })
})
