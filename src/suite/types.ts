import type { LineExpectations, LineSource } from "../assert/expect.js"
import type { BatchResult, EngineProcess, EngineSpawnOptions } from "../engine/engineProcess.js"
import type { Instrumentation } from "../engine/instrumentation.js"

export interface SuiteContext {
  readonly suite: string
  /** Per-suite temporary directory; fixtures are written here. */
  readonly scratchDir: string
  readonly instrumentation: Instrumentation
  readonly timeoutMs: number
  fixturePath(name: string): string
  /** Starts the configured program interactively. Left-running processes are terminated when the suite ends. */
  spawnEngine(args?: readonly string[], options?: EngineSpawnOptions): Promise<EngineProcess>
  runBatch(args?: readonly string[], options?: EngineSpawnOptions): Promise<BatchResult>
  expect(source: LineSource, timeoutMs?: number): LineExpectations
  log(message: string): void
}

export type SuiteStep = (context: SuiteContext) => void | Promise<void>

export interface TestCaseDefinition {
  readonly name: string
  readonly run: SuiteStep
}

export interface SuiteHooks {
  readonly beforeAll: SuiteStep
  readonly beforeEach: SuiteStep
  readonly afterEach: SuiteStep
  readonly afterAll: SuiteStep
}

export type HookKey = keyof SuiteHooks

export interface FixtureDefinition {
  readonly name: string
  readonly content: string
}

export interface SuiteDefinition {
  readonly name: string
  readonly cases: readonly TestCaseDefinition[]
  readonly hooks: SuiteHooks
  readonly fixtures: readonly FixtureDefinition[]
}
