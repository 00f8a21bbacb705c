import type { ChalkInstance } from "chalk"
import { tmpdir } from "node:os"
import { Effect, type Either } from "effect"
import type { HarnessConfig } from "../config/harnessConfig.js"
import { SetupError, TimedOut, describeError } from "../engine/errors.js"
import { resolveInstrumentation, type Instrumentation } from "../engine/instrumentation.js"
import { createScratchDir, removeScratchDir, writeFixtures } from "../suite/fixtures.js"
import type { HookKey, SuiteContext, SuiteDefinition, SuiteStep, TestCaseDefinition } from "../suite/types.js"
import { warn } from "../util/log.js"
import { createSuiteContext, type SuiteContextHandle } from "./context.js"
import {
  createPalette,
  createRunReport,
  describeFailure,
  formatCase,
  formatFailure,
  formatSuiteHeader,
  type CaseRecord,
  type RunReport,
  type SuiteRecord,
} from "./report.js"

export interface ReportListener {
  update(report: Readonly<RunReport>): void
  finish(report: Readonly<RunReport>): void
}

export interface SchedulerOptions {
  readonly config: HarnessConfig
  readonly listener?: ReportListener
  readonly instrumentation?: Instrumentation
  readonly color?: boolean
}

interface PreparedSuite extends SuiteContextHandle {
  readonly scratchDir: string | undefined
  readonly failure: { readonly error: unknown } | null
}

const attempt = (run: () => void | Promise<void>): Effect.Effect<Either.Either<void, unknown>> =>
  Effect.either(
    Effect.tryPromise({
      try: async () => {
        await run()
      },
      catch: (error) => error,
    }),
  )

const elapsedSince = (started: number): number => performance.now() - started

/**
 * Runs every suite on its own fiber; cases inside a suite run one after the
 * other. Report mutations go through a single-permit semaphore and each
 * update holds it only for that update.
 */
export class Scheduler {
  private report: RunReport = createRunReport()
  private readonly lock = Effect.unsafeMakeSemaphore(1)
  private readonly palette: ChalkInstance
  private readonly instrumentation: Instrumentation

  constructor(private readonly options: SchedulerOptions) {
    this.palette = createPalette(options.color ?? options.config.color)
    this.instrumentation =
      options.instrumentation ??
      resolveInstrumentation(options.config.instrumentation, { suppressions: options.config.suppressions })
  }

  get state(): Readonly<RunReport> {
    return this.report
  }

  hasFailed(): boolean {
    return this.report.suitesFailed > 0
  }

  exitCode(): 0 | 1 {
    return this.hasFailed() ? 1 : 0
  }

  async run(suites: readonly SuiteDefinition[]): Promise<RunReport> {
    this.report = createRunReport(Date.now())
    const started = performance.now()
    await Effect.runPromise(
      Effect.forEach(suites, (suite) => this.runSuite(suite), { concurrency: "unbounded", discard: true }),
    )
    this.report.durationMs = elapsedSince(started)
    this.options.listener?.finish(this.report)
    return this.report
  }

  private update(mutate: (report: RunReport) => void): Effect.Effect<void> {
    return this.lock.withPermits(1)(
      Effect.sync(() => {
        mutate(this.report)
        this.options.listener?.update(this.report)
      }),
    )
  }

  private recordCase(record: SuiteRecord, entry: CaseRecord): Effect.Effect<void> {
    return this.update((report) => {
      record.cases.push(entry)
      record.lines.push(formatCase(this.palette, entry))
      if (entry.status === "passed") {
        report.testsPassed += 1
      } else {
        report.testsFailed += 1
        record.failures += 1
      }
    })
  }

  private recordSuiteProblem(record: SuiteRecord, label: string, error: unknown, durationMs = 0): Effect.Effect<void> {
    return this.update(() => {
      record.failures += 1
      record.lines.push(formatFailure(this.palette, label, durationMs, describeFailure(error)))
    })
  }

  /**
   * Builds the suite's scratch directory and context. A setup failure still
   * yields a context, over whatever directory exists, so `afterAll` can run.
   */
  private prepare(suite: SuiteDefinition): Effect.Effect<PreparedSuite> {
    const { config } = this.options
    const instrumentation = this.instrumentation
    return Effect.promise(async () => {
      let scratchDir: string | undefined
      let environment: Record<string, string> = {}
      let failure: { readonly error: unknown } | null = null
      try {
        scratchDir = await createScratchDir(suite.name)
        await writeFixtures(scratchDir, suite.fixtures)
        environment = await instrumentation.environment(scratchDir)
      } catch (error) {
        failure = {
          error: new SetupError(suite.name, "beforeAll", `Suite setup failed: ${describeError(error)}`, { cause: error }),
        }
      }
      const handle = createSuiteContext(suite.name, scratchDir ?? tmpdir(), config, instrumentation, environment)
      return { ...handle, scratchDir, failure }
    })
  }

  private runCase(
    suite: SuiteDefinition,
    record: SuiteRecord,
    testCase: TestCaseDefinition,
    context: SuiteContext,
  ): Effect.Effect<void> {
    const recordCase = (entry: CaseRecord) => this.recordCase(record, entry)
    return Effect.gen(function* () {
      const started = performance.now()
      const outcome = yield* attempt(async () => {
        await suite.hooks.beforeEach(context)
        let failure: { readonly error: unknown } | null = null
        try {
          await testCase.run(context)
        } catch (error) {
          failure = { error }
        }
        try {
          await suite.hooks.afterEach(context)
        } catch (error) {
          // The case's own error takes precedence over a teardown fault.
          failure ??= { error }
        }
        if (failure) throw failure.error
      })
      const durationMs = elapsedSince(started)
      if (outcome._tag === "Right") {
        yield* recordCase({ suite: suite.name, name: testCase.name, status: "passed", durationMs })
        return
      }
      const error = outcome.left
      if (error instanceof TimedOut) {
        yield* recordCase({
          suite: suite.name,
          name: testCase.name,
          status: "timedOut",
          durationMs: error.timeoutMs,
          failure: { message: error.message, trace: "" },
        })
        return
      }
      yield* recordCase({
        suite: suite.name,
        name: testCase.name,
        status: "failed",
        durationMs,
        failure: describeFailure(error),
      })
    })
  }

  private runSuite(suite: SuiteDefinition): Effect.Effect<void> {
    const record: SuiteRecord = { name: suite.name, lines: [], cases: [], failures: 0, finished: false }
    const open = this.update((report) => {
      report.suites.push(record)
      record.lines.push(formatSuiteHeader(this.palette, suite.name))
    })
    const prepare = this.prepare(suite)
    const runCase = (testCase: TestCaseDefinition, context: SuiteContext) =>
      this.runCase(suite, record, testCase, context)
    const problem = (label: string, error: unknown, durationMs?: number) =>
      this.recordSuiteProblem(record, label, error, durationMs)
    const close = this.update((report) => {
      record.finished = true
      if (record.failures > 0) {
        report.suitesFailed += 1
      } else {
        report.suitesPassed += 1
      }
    })
    const hook = (key: HookKey, step: SuiteStep, context: SuiteContext) =>
      Effect.gen(function* () {
        const started = performance.now()
        const outcome = yield* attempt(() => step(context))
        if (outcome._tag === "Left") {
          const error = new SetupError(suite.name, key, `${key} failed: ${describeError(outcome.left)}`, {
            cause: outcome.left,
          })
          yield* problem(key, error, elapsedSince(started))
          return false
        }
        return true
      })

    return Effect.gen(function* () {
      yield* open
      const { context, release, scratchDir, failure } = yield* prepare
      if (failure) {
        yield* problem("setup", failure.error)
      }

      let ready = false
      if (!failure) {
        ready = yield* hook("beforeAll", suite.hooks.beforeAll, context)
      }
      if (ready) {
        for (const testCase of suite.cases) {
          yield* runCase(testCase, context)
        }
      }
      yield* hook("afterAll", suite.hooks.afterAll, context)

      const released = yield* Effect.either(Effect.tryPromise({ try: release, catch: (error) => error }))
      if (released._tag === "Left") {
        yield* problem("release", released.left)
      } else {
        for (const entry of released.right) {
          yield* problem(`release ${entry.engine}`, new Error(entry.message))
        }
      }
      if (scratchDir !== undefined) {
        const removed = yield* Effect.either(
          Effect.tryPromise({ try: () => removeScratchDir(scratchDir), catch: (error) => error }),
        )
        if (removed._tag === "Left") {
          warn("scheduler", `Failed to remove ${scratchDir}: ${describeError(removed.left)}`)
        }
      }
      yield* close
    })
  }
}
