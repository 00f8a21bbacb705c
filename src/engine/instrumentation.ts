import { promises as fs } from "node:fs"
import path from "node:path"

export const INSTRUMENTATION_NAMES = [
  "none",
  "memcheck",
  "threadcheck",
  "sanitizer-undefined",
  "sanitizer-thread",
] as const

export type InstrumentationName = (typeof INSTRUMENTATION_NAMES)[number]

/** Exit code the valgrind presets use to signal a diagnostic finding. */
export const DIAGNOSTIC_EXIT_CODE = 42

const EXCERPT_LINES = 50

export type TranscriptCheckResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly marker: string; readonly excerpt: readonly string[] }

export type TranscriptCheck = (transcript: readonly string[]) => TranscriptCheckResult

export interface Instrumentation {
  readonly name: InstrumentationName
  readonly prefix: readonly string[]
  /** Worker thread count suites should configure under this tool. */
  readonly threads: number
  readonly postCheck?: TranscriptCheck
  environment(scratchDir: string): Promise<Record<string, string>>
}

export interface InstrumentationOptions {
  readonly suppressions?: readonly string[]
}

export const isInstrumentationName = (value: string): value is InstrumentationName =>
  INSTRUMENTATION_NAMES.some((name) => name === value)

export const markerCheck =
  (marker: string): TranscriptCheck =>
  (transcript) => {
    const index = transcript.findIndex((line) => line.includes(marker))
    if (index < 0) return { ok: true }
    return { ok: false, marker, excerpt: transcript.slice(index, index + EXCERPT_LINES) }
  }

const noEnvironment = async (): Promise<Record<string, string>> => ({})

const tsanEnvironment =
  (suppressions: readonly string[]) =>
  async (scratchDir: string): Promise<Record<string, string>> => {
    if (suppressions.length === 0) return {}
    const file = path.join(scratchDir, "tsan.supp")
    await fs.writeFile(file, `${suppressions.join("\n")}\n`, "utf8")
    return { TSAN_OPTIONS: `suppressions=${file}` }
  }

export const resolveInstrumentation = (
  name: InstrumentationName,
  options: InstrumentationOptions = {},
): Instrumentation => {
  switch (name) {
    case "memcheck":
      return {
        name,
        prefix: [
          "valgrind",
          `--error-exitcode=${DIAGNOSTIC_EXIT_CODE}`,
          "--errors-for-leak-kinds=all",
          "--leak-check=full",
        ],
        threads: 1,
        environment: noEnvironment,
      }
    case "threadcheck":
      return {
        name,
        prefix: ["valgrind", `--error-exitcode=${DIAGNOSTIC_EXIT_CODE}`, "--fair-sched=try"],
        threads: 2,
        environment: noEnvironment,
      }
    case "sanitizer-undefined":
      return {
        name,
        prefix: [],
        threads: 1,
        postCheck: markerCheck("runtime error:"),
        environment: noEnvironment,
      }
    case "sanitizer-thread":
      return {
        name,
        prefix: [],
        threads: 2,
        postCheck: markerCheck("WARNING: ThreadSanitizer:"),
        environment: tsanEnvironment(options.suppressions ?? []),
      }
    case "none":
      return { name, prefix: [], threads: 1, environment: noEnvironment }
  }
}
