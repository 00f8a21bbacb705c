import path from "node:path"
import { describe, it, expect } from "vitest"
import { isContainedPath, resolveFixturePath } from "../src/suite/fixtures.js"

describe("fixture paths", () => {
  it("accepts relative names that stay inside the directory", () => {
    expect(isContainedPath("a.txt")).toBe(true)
    expect(isContainedPath("data/a.txt")).toBe(true)
    expect(isContainedPath("data/../a.txt")).toBe(true)
    expect(isContainedPath("..data")).toBe(true)
  })

  it("rejects names that escape or name the directory itself", () => {
    expect(isContainedPath("../a.txt")).toBe(false)
    expect(isContainedPath("data/../../a.txt")).toBe(false)
    expect(isContainedPath("/tmp/a.txt")).toBe(false)
    expect(isContainedPath("")).toBe(false)
    expect(isContainedPath(".")).toBe(false)
  })

  it("resolves contained names against the scratch directory", () => {
    const base = path.resolve("scratch-base")
    expect(resolveFixturePath(base, "data/a.txt")).toBe(path.join(base, "data", "a.txt"))
    expect(() => resolveFixturePath(base, "../a.txt")).toThrow("Fixture path escapes the scratch directory: ../a.txt")
  })
})
