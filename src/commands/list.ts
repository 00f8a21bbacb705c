import { Args, Command } from "@effect/cli"
import { Console, Effect } from "effect"
import { describeError } from "../engine/errors.js"
import type { SuiteListing } from "../suite/registry.js"
import { loadSuiteModules } from "./suiteModules.js"

const modulesArg = Args.text({ name: "suite-module" }).pipe(Args.repeated)

export const formatListing = (listings: readonly SuiteListing[]): string => {
  if (listings.length === 0) {
    return "No suites found."
  }
  return listings.flatMap((entry) => [entry.suite, ...entry.cases.map((name) => `  ${name}`)]).join("\n")
}

export const listCommand = Command.make("list", { modules: modulesArg }, ({ modules }) =>
  Effect.gen(function* () {
    const registry = yield* Effect.tryPromise({ try: () => loadSuiteModules(modules), catch: (error) => error }).pipe(
      Effect.tapError((error) => Console.error(`[list] ${describeError(error)}`)),
    )
    yield* Console.log(formatListing(registry.list()))
  }),
)
