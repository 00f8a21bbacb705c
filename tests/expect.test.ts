import { describe, it, expect } from "vitest"
import { LineExpectations, check, fail, scan } from "../src/assert/expect.js"
import { AssertionFailed, TimedOut } from "../src/engine/errors.js"
import { memorySource, sleep } from "./helpers/harness.js"

describe("LineExpectations", () => {
  it("skips non-matching lines and returns the first match", async () => {
    const source = memorySource(["id name Fake", "uciok", "readyok"])
    const lines = new LineExpectations(source, 1_000)
    expect(await lines.equals("uciok")).toBe("uciok")
    expect(await source.readLine()).toBe("readyok")
  })

  it("supports glob, substring and prefix scans", async () => {
    const source = memorySource([
      "info depth 1 score cp 10",
      "info depth 2 score cp 20",
      "bestmove e2e4 ponder e7e5",
      "option name Hash",
    ])
    const lines = new LineExpectations(source, 1_000)
    expect(await lines.contains("cp 20")).toBe("info depth 2 score cp 20")
    expect(await lines.expect("bestmove *")).toBe("bestmove e2e4 ponder e7e5")
    expect(await lines.startsWith("option")).toBe("option name Hash")
  })

  it("waits for lines that arrive later", async () => {
    const source = memorySource()
    setTimeout(() => source.queue.push("readyok"), 30)
    expect(await new LineExpectations(source, 1_000).equals("readyok")).toBe("readyok")
  })

  it("stops a checkOutput scan when the callback returns true", async () => {
    const source = memorySource(["info depth 1", "info depth 2", "bestmove a2a3"])
    const seen: string[] = []
    const matched = await new LineExpectations(source, 1_000).checkOutput((line) => {
      seen.push(line)
      return line.startsWith("bestmove")
    })
    expect(matched).toBe("bestmove a2a3")
    expect(seen).toEqual(["info depth 1", "info depth 2", "bestmove a2a3"])
  })

  it("propagates an assertion raised by the callback", async () => {
    const source = memorySource(["score -5"])
    const lines = new LineExpectations(source, 1_000)
    await expect(
      lines.checkOutput((line) => {
        check(!line.includes("-"), `negative score in "${line}"`)
      }),
    ).rejects.toBeInstanceOf(AssertionFailed)
  })
})

describe("scan deadline", () => {
  it("raises TimedOut close to the deadline", async () => {
    const source = memorySource(["noise"])
    const started = Date.now()
    const error = await scan(source, 'equals "never"', (line) => line === "never", { timeoutMs: 150 }).catch(
      (caught: unknown) => caught,
    )
    const elapsed = Date.now() - started
    expect(error).toBeInstanceOf(TimedOut)
    if (!(error instanceof TimedOut)) return
    expect(error.timeoutMs).toBe(150)
    expect(error.description).toBe('equals "never"')
    expect(error.message).toMatch(/^equals "never" timed out after \d+\.\d\d seconds$/)
    expect(elapsed).toBeGreaterThanOrEqual(140)
    expect(elapsed).toBeLessThan(1_000)
  })

  it("reports a closed stream as a timeout at the deadline", async () => {
    const source = memorySource(["only"])
    source.queue.close()
    const started = Date.now()
    await expect(new LineExpectations(source, 100).equals("missing")).rejects.toBeInstanceOf(TimedOut)
    expect(Date.now() - started).toBeGreaterThanOrEqual(90)
  })

  it("leaves later output for the next reader after a timeout", async () => {
    const source = memorySource()
    await expect(new LineExpectations(source, 50).equals("early")).rejects.toBeInstanceOf(TimedOut)
    source.queue.push("after")
    await sleep(5)
    expect(await source.readLine()).toBe("after")
  })
})

describe("fail", () => {
  it("throws AssertionFailed carrying actual and expected", () => {
    try {
      fail("mismatch", { actual: "a", expected: "b" })
    } catch (error) {
      expect(error).toBeInstanceOf(AssertionFailed)
      if (!(error instanceof AssertionFailed)) return
      expect(error.message).toBe("mismatch")
      expect(error.actual).toBe("a")
      expect(error.expected).toBe("b")
      return
    }
    throw new Error("fail() returned")
  })
})
