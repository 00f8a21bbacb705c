import { tmpdir } from "node:os"
import { fileURLToPath } from "node:url"
import type { HarnessConfig } from "../../src/config/harnessConfig.js"
import { ProcessError } from "../../src/engine/errors.js"
import { resolveInstrumentation } from "../../src/engine/instrumentation.js"
import { LineQueue } from "../../src/engine/lineQueue.js"
import type { OutputSurface } from "../../src/reporter/renderers.js"
import { createSuiteContext } from "../../src/runner/context.js"
import type { SuiteContext } from "../../src/suite/types.js"

export const FAKE_ENGINE = fileURLToPath(new URL("../fixtures/fakeEngine.mjs", import.meta.url))

export const testConfig = (overrides: Partial<HarnessConfig> = {}): HarnessConfig => ({
  enginePath: process.execPath,
  engineArgs: [FAKE_ENGINE],
  cwd: process.cwd(),
  env: {},
  timeoutMs: 5_000,
  instrumentation: "none",
  suppressions: [],
  display: "plain",
  color: false,
  graceMs: 200,
  quitCommand: "quit",
  ...overrides,
})

/** In-memory line source with the same end-of-stream behaviour as a process. */
export const memorySource = (lines: readonly string[] = []) => {
  const queue = new LineQueue()
  for (const line of lines) queue.push(line)
  return {
    queue,
    readLine: async (signal?: AbortSignal): Promise<string> => {
      const line = await queue.next(signal)
      if (line === null) throw new ProcessError("EndOfStream", "closed")
      return line
    },
  }
}

export const captureSurface = (columns?: number): OutputSurface & { readonly writes: string[] } => {
  const writes: string[] = []
  return {
    writes,
    columns,
    write: (text: string) => {
      writes.push(text)
    },
  }
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/** A suite context over the fake engine, for calling steps directly. */
export const stubContext = (suite = "Stub"): SuiteContext =>
  createSuiteContext(suite, tmpdir(), testConfig(), resolveInstrumentation("none"), {}).context
