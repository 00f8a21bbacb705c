import { existsSync, readFileSync } from "node:fs"
import { describe, it, expect } from "vitest"
import { fail } from "../src/assert/expect.js"
import { resolveInstrumentation } from "../src/engine/instrumentation.js"
import type { RunReport } from "../src/runner/report.js"
import { Scheduler, type ReportListener } from "../src/runner/scheduler.js"
import { defineSuite } from "../src/suite/registry.js"
import { FAKE_ENGINE, memorySource, sleep, testConfig } from "./helpers/harness.js"

const recordingListener = () => {
  const updates: number[] = []
  const finished: RunReport[] = []
  const listener: ReportListener = {
    update: (report) => {
      updates.push(report.suites.length)
    },
    finish: (report) => {
      finished.push(report)
    },
  }
  return { listener, updates, finished }
}

describe("Scheduler", () => {
  it("runs cases in declaration order and reports a passing run", async () => {
    const order: string[] = []
    const suite = defineSuite("Sequence", (s) => {
      s.beforeAll(() => {
        order.push("beforeAll")
      })
        .beforeEach(() => {
          order.push("beforeEach")
        })
        .afterEach(() => {
          order.push("afterEach")
        })
        .afterAll(() => {
          order.push("afterAll")
        })
        .test("first", () => {
          order.push("first")
        })
        .test("second", async () => {
          await sleep(5)
          order.push("second")
        })
    })
    const { listener, finished } = recordingListener()
    const scheduler = new Scheduler({ config: testConfig(), listener })
    const report = await scheduler.run([suite])

    expect(order).toEqual([
      "beforeAll",
      "beforeEach",
      "first",
      "afterEach",
      "beforeEach",
      "second",
      "afterEach",
      "afterAll",
    ])
    expect(report.suites[0]?.cases.map((entry) => [entry.name, entry.status])).toEqual([
      ["first", "passed"],
      ["second", "passed"],
    ])
    expect(report.suites[0]?.lines[0]).toBe("Test Suite: Sequence")
    expect(report.testsPassed).toBe(2)
    expect(report.suitesPassed).toBe(1)
    expect(scheduler.hasFailed()).toBe(false)
    expect(scheduler.exitCode()).toBe(0)
    expect(finished).toHaveLength(1)
  })

  it("skips every case when beforeAll fails but still runs afterAll once", async () => {
    let caseRuns = 0
    let afterAllRuns = 0
    const suite = defineSuite("Broken", (s) => {
      s.beforeAll(() => {
        throw new Error("no engine")
      })
        .afterAll(() => {
          afterAllRuns += 1
        })
        .test("a", () => {
          caseRuns += 1
        })
        .test("b", () => {
          caseRuns += 1
        })
    })
    const scheduler = new Scheduler({ config: testConfig() })
    const report = await scheduler.run([suite])

    expect(caseRuns).toBe(0)
    expect(afterAllRuns).toBe(1)
    expect(report.suitesFailed).toBe(1)
    expect(report.testsPassed + report.testsFailed).toBe(0)
    const record = report.suites[0]
    expect(record?.failures).toBe(1)
    expect(record?.lines[1]).toMatch(/^ {4}✗ beforeAll \(\d+\.\d\dms\)\n {6}SetupError: beforeAll failed: no engine/)
    expect(scheduler.exitCode()).toBe(1)
  })

  it("records failures and timeouts and keeps going", async () => {
    const suite = defineSuite("Mixed", (s) => {
      s.test("mismatch", () => {
        fail("expected readyok")
      })
        .test("slow", async (context) => {
          await context.expect(memorySource(), 50).equals("never")
        })
        .test("fine", () => undefined)
    })
    const scheduler = new Scheduler({ config: testConfig() })
    const report = await scheduler.run([suite])
    const cases = report.suites[0]?.cases ?? []

    expect(cases.map((entry) => entry.status)).toEqual(["failed", "timedOut", "passed"])
    expect(cases[0]?.failure?.message).toBe("AssertionFailed: expected readyok")
    expect(cases[1]?.durationMs).toBe(50)
    expect(cases[1]?.failure?.message).toMatch(/^equals "never" timed out after/)
    expect(report.testsFailed).toBe(2)
    expect(report.testsPassed).toBe(1)
    expect(report.suitesFailed).toBe(1)
    expect(scheduler.hasFailed()).toBe(true)
  })

  it("fails a case whose afterEach raises", async () => {
    const suite = defineSuite("Teardown", (s) => {
      s.afterEach(() => {
        throw new Error("cleanup broke")
      }).test("body", () => undefined)
    })
    const report = await new Scheduler({ config: testConfig() }).run([suite])
    expect(report.suites[0]?.cases[0]?.status).toBe("failed")
    expect(report.suites[0]?.cases[0]?.failure?.message).toBe("Error: cleanup broke")
  })

  it("marks the suite failed when afterAll raises", async () => {
    const suite = defineSuite("Closing", (s) => {
      s.afterAll(() => {
        throw new Error("late")
      }).test("body", () => undefined)
    })
    const scheduler = new Scheduler({ config: testConfig() })
    const report = await scheduler.run([suite])
    expect(report.testsPassed).toBe(1)
    expect(report.suitesFailed).toBe(1)
    expect(scheduler.exitCode()).toBe(1)
  })

  it("runs suites concurrently", async () => {
    const suites = ["One", "Two", "Three"].map((name) =>
      defineSuite(name, (s) => {
        s.test("wait", () => sleep(400))
      }),
    )
    const { listener, updates } = recordingListener()
    const scheduler = new Scheduler({ config: testConfig(), listener })
    const begin = Date.now()
    const report = await scheduler.run(suites)

    expect(Date.now() - begin).toBeLessThan(1_100)
    expect(report.suitesPassed).toBe(3)
    expect(report.suites.map((record) => record.name)).toEqual(["One", "Two", "Three"])
    expect(updates.length).toBeGreaterThanOrEqual(9)
  })

  it("writes fixtures into a scratch directory and removes it afterwards", async () => {
    let scratch = ""
    let content = ""
    const suite = defineSuite("Files", (s) => {
      s.fixture("data/positions.txt", "startpos\n").test("reads", (context) => {
        scratch = context.scratchDir
        content = readFileSync(context.fixturePath("data/positions.txt"), "utf8")
      })
    })
    await new Scheduler({ config: testConfig() }).run([suite])
    expect(content).toBe("startpos\n")
    expect(scratch).not.toBe("")
    expect(existsSync(scratch)).toBe(false)
  })

  it("drives the engine through the suite context and terminates it at the end", async () => {
    let pid: number | undefined
    const suite = defineSuite("Engine", (s) => {
      s.test("handshake", async (context) => {
        const engine = await context.spawnEngine()
        pid = engine.pid
        engine.sendCommand("uci")
        await context.expect(engine).equals("uciok")
        engine.sendCommand("go depth 3")
        await context.expect(engine).expect("bestmove *")
      })
    })
    const report = await new Scheduler({ config: testConfig() }).run([suite])
    expect(report.suites[0]?.cases[0]?.status).toBe("passed")
    expect(pid).toBeTypeOf("number")
  })

  it("runs batch invocations through the suite context", async () => {
    let stdout = ""
    let exitCode = -1
    const suite = defineSuite("Batch", (s) => {
      s.test("prints", async (context) => {
        const result = await context.runBatch([FAKE_ENGINE, "--batch", "--say", "hello", "--code", "2"])
        stdout = result.stdout
        exitCode = result.exitCode
      })
    })
    const report = await new Scheduler({ config: testConfig() }).run([suite])
    expect(report.suites[0]?.cases[0]?.status).toBe("passed")
    expect(stdout).toBe("hello\n")
    expect(exitCode).toBe(2)
  })

  it("keeps a timeout as the case result when afterEach also fails", async () => {
    const suite = defineSuite("SlowTeardown", (s) => {
      s.afterEach(() => {
        throw new Error("cleanup broke")
      }).test("waits", async (context) => {
        await context.expect(memorySource(), 50).equals("x")
      })
    })
    const report = await new Scheduler({ config: testConfig() }).run([suite])
    const entry = report.suites[0]?.cases[0]
    expect(entry?.status).toBe("timedOut")
    expect(entry?.durationMs).toBe(50)
    expect(entry?.failure?.message).toMatch(/^equals "x" timed out after/)
  })

  it("still runs afterAll and removes the scratch directory when setup fails", async () => {
    let scratch = ""
    let afterAllRuns = 0
    let caseRuns = 0
    const instrumentation = {
      ...resolveInstrumentation("none"),
      environment: async (dir: string): Promise<Record<string, string>> => {
        scratch = dir
        throw new Error("disk full")
      },
    }
    const suite = defineSuite("NoSetup", (s) => {
      s.afterAll(() => {
        afterAllRuns += 1
      }).test("never", () => {
        caseRuns += 1
      })
    })
    const scheduler = new Scheduler({ config: testConfig(), instrumentation })
    const report = await scheduler.run([suite])

    expect(afterAllRuns).toBe(1)
    expect(caseRuns).toBe(0)
    expect(scratch).not.toBe("")
    expect(existsSync(scratch)).toBe(false)
    expect(report.suites[0]?.lines[1]).toMatch(/^ {4}✗ setup \(0\.00ms\)\n {6}SetupError: Suite setup failed: disk full/)
    expect(report.suitesFailed).toBe(1)
    expect(scheduler.exitCode()).toBe(1)
  })

  it("overlaps delays that happen inside the spawned programs", async () => {
    const suites = ["Left", "Right"].map((name) =>
      defineSuite(name, (s) => {
        s.test("sleeps", async (context) => {
          const engine = await context.spawnEngine()
          engine.sendCommand("sleep 1000")
          await context.expect(engine).equals("slept")
        })
      }),
    )
    const scheduler = new Scheduler({ config: testConfig() })
    const begin = Date.now()
    const report = await scheduler.run(suites)
    const elapsed = Date.now() - begin

    expect(report.testsPassed).toBe(2)
    expect(elapsed).toBeGreaterThanOrEqual(1_000)
    expect(elapsed).toBeLessThan(1_900)
  })
})
