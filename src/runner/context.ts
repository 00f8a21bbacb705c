import { LineExpectations, type LineSource } from "../assert/expect.js"
import type { HarnessConfig } from "../config/harnessConfig.js"
import { EngineProcess, type BatchResult, type EngineSpawnOptions } from "../engine/engineProcess.js"
import { ProcessError, describeError } from "../engine/errors.js"
import type { Instrumentation, TranscriptCheckResult } from "../engine/instrumentation.js"
import { resolveFixturePath } from "../suite/fixtures.js"
import type { SuiteContext } from "../suite/types.js"
import { debugLog } from "../util/log.js"

export interface ReleaseProblem {
  readonly engine: string
  readonly message: string
}

export interface SuiteContextHandle {
  readonly context: SuiteContext
  /** Terminates every process the suite left running and runs their post-checks. */
  release(): Promise<readonly ReleaseProblem[]>
}

export const formatCheckFailure = (result: TranscriptCheckResult): string =>
  result.ok ? "" : [`Found "${result.marker}" in output:`, ...result.excerpt].join("\n")

export const createSuiteContext = (
  suite: string,
  scratchDir: string,
  config: HarnessConfig,
  instrumentation: Instrumentation,
  instrumentationEnv: Readonly<Record<string, string>>,
): SuiteContextHandle => {
  const engines: EngineProcess[] = []

  const spawnOptions = (options: EngineSpawnOptions): EngineSpawnOptions => ({
    cwd: config.cwd,
    quitCommand: config.quitCommand,
    graceMs: config.graceMs,
    postCheck: instrumentation.postCheck,
    ...options,
    env: { ...config.env, ...instrumentationEnv, ...options.env },
  })

  const requireEngine = (): string => {
    if (!config.enginePath) {
      throw new ProcessError("SpawnFailed", "No engine configured (use --engine or LINECHECK_ENGINE)")
    }
    return config.enginePath
  }

  const context: SuiteContext = {
    suite,
    scratchDir,
    instrumentation,
    timeoutMs: config.timeoutMs,
    fixturePath: (name) => resolveFixturePath(scratchDir, name),
    spawnEngine: async (args = config.engineArgs, options = {}) => {
      const enginePath = requireEngine()
      const engine = new EngineProcess(spawnOptions(options))
      engines.push(engine)
      await engine.start(instrumentation.prefix, enginePath, args, "interactive")
      return engine
    },
    runBatch: async (args = config.engineArgs, options = {}): Promise<BatchResult> => {
      const enginePath = requireEngine()
      const engine = new EngineProcess(spawnOptions({ batchTimeoutMs: config.timeoutMs, ...options }))
      await engine.start(instrumentation.prefix, enginePath, args, "batch")
      const verdict = engine.verify()
      if (!verdict.ok) {
        throw new ProcessError("PostCheckFailed", formatCheckFailure(verdict), verdict)
      }
      return engine.batchResult
    },
    expect: (source: LineSource, timeoutMs?: number) => new LineExpectations(source, timeoutMs ?? config.timeoutMs),
    log: (message) => debugLog({ suite, message }),
  }

  const release = async (): Promise<readonly ReleaseProblem[]> => {
    const problems: ReleaseProblem[] = []
    for (const engine of engines) {
      const label = `pid ${engine.pid ?? "?"}`
      try {
        await engine.terminate()
      } catch (error) {
        problems.push({ engine: label, message: `terminate failed: ${describeError(error)}` })
        continue
      }
      const verdict = engine.verify()
      if (!verdict.ok) {
        problems.push({ engine: label, message: formatCheckFailure(verdict) })
      }
    }
    engines.length = 0
    return problems
  }

  return { context, release }
}
