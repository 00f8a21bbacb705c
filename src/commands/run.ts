import { Args, Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { loadHarnessConfig, type HarnessOverrides } from "../config/harnessConfig.js"
import { describeError } from "../engine/errors.js"
import { INSTRUMENTATION_NAMES, isInstrumentationName } from "../engine/instrumentation.js"
import { createReporter } from "../reporter/reporter.js"
import { Scheduler } from "../runner/scheduler.js"
import { loadSuiteModules } from "./suiteModules.js"

export class RunFailed extends Error {
  constructor(message: string) {
    super(message)
    this.name = "RunFailed"
  }
}

const modulesArg = Args.text({ name: "suite-module" }).pipe(Args.repeated)
const engineOption = Options.text("engine").pipe(Options.optional)
const timeoutOption = Options.integer("timeout-ms").pipe(Options.optional)
const instrumentOption = Options.text("instrument").pipe(Options.optional)
const plainOption = Options.boolean("plain").pipe(Options.withDefault(false))
const noColorOption = Options.boolean("no-color").pipe(Options.withDefault(false))
const suiteOption = Options.text("suite").pipe(Options.repeated)

export interface RunFlags {
  readonly engine: Option.Option<string>
  readonly timeoutMs: Option.Option<number>
  readonly instrument: Option.Option<string>
  readonly plain: boolean
  readonly noColor: boolean
}

export const overridesFromFlags = (flags: RunFlags): HarnessOverrides => {
  const overrides: HarnessOverrides = {}
  const engine = Option.getOrUndefined(flags.engine)
  if (engine) overrides.enginePath = engine
  const timeoutMs = Option.getOrUndefined(flags.timeoutMs)
  if (timeoutMs !== undefined) {
    if (timeoutMs <= 0) throw new RunFailed("--timeout-ms must be positive")
    overrides.timeoutMs = timeoutMs
  }
  const instrument = Option.getOrUndefined(flags.instrument)
  if (instrument !== undefined) {
    if (!isInstrumentationName(instrument)) {
      throw new RunFailed(`Unknown instrumentation "${instrument}" (expected one of ${INSTRUMENTATION_NAMES.join(", ")})`)
    }
    overrides.instrumentation = instrument
  }
  if (flags.plain) overrides.display = "plain"
  if (flags.noColor) overrides.color = false
  return overrides
}

export const runCommand = Command.make(
  "run",
  {
    modules: modulesArg,
    engine: engineOption,
    timeoutMs: timeoutOption,
    instrument: instrumentOption,
    plain: plainOption,
    noColor: noColorOption,
    suites: suiteOption,
  },
  ({ modules, suites, ...flags }) =>
    Effect.gen(function* () {
      if (modules.length === 0) {
        return yield* Effect.fail(new RunFailed("No suite modules given"))
      }
      const outcome = yield* Effect.either(
        Effect.tryPromise({
          try: async () => {
            const config = loadHarnessConfig(overridesFromFlags(flags))
            const registry = await loadSuiteModules(modules)
            const selected = registry.filter(suites)
            if (selected.length === 0) {
              throw new RunFailed(`No suites matched ${suites.join(", ")}`)
            }
            const reporter = createReporter({ display: config.display, color: config.color })
            const scheduler = new Scheduler({ config, listener: reporter })
            await scheduler.run(selected)
            return scheduler.exitCode()
          },
          catch: (error) => error,
        }),
      )
      if (outcome._tag === "Left") {
        yield* Console.error(`[run] ${describeError(outcome.left)}`)
        return yield* Effect.fail(new RunFailed(describeError(outcome.left)))
      }
      if (outcome.right !== 0) {
        return yield* Effect.fail(new RunFailed("One or more suites failed"))
      }
    }),
)
