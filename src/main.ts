#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { listCommand } from "./commands/list.js"
import { runCommand } from "./commands/run.js"

const root = Command.make("linecheck", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([runCommand, listCommand]),
)

const cli = Command.run(root, { name: "linecheck", version: "0.1.0" })

// Failures are reported by the commands; the runtime only sets the exit code.
cli(process.argv).pipe(Effect.provide(NodeContext.layer), (effect) =>
  NodeRuntime.runMain(effect, { disableErrorReporting: true }),
)
