import dotenv from "dotenv"
import fs from "node:fs"
import path from "node:path"
import { parse as parseYaml } from "yaml"
import { DEFAULT_TIMEOUT_MS } from "../assert/expect.js"
import { describeError } from "../engine/errors.js"
import { isInstrumentationName, type InstrumentationName } from "../engine/instrumentation.js"
import { warn } from "../util/log.js"

export type DisplayMode = "live" | "plain"

export interface HarnessConfig {
  readonly enginePath: string | undefined
  readonly engineArgs: readonly string[]
  readonly cwd: string
  /** Extra environment for every spawned program, merged over the harness's own. */
  readonly env: Readonly<Record<string, string>>
  readonly timeoutMs: number
  readonly instrumentation: InstrumentationName
  readonly suppressions: readonly string[]
  readonly display: DisplayMode
  readonly color: boolean
  readonly graceMs: number
  readonly quitCommand: string
}

export type HarnessOverrides = { -readonly [K in keyof HarnessConfig]?: HarnessConfig[K] }

export const CONFIG_FILE_NAME = "linecheck.config.yaml"

const DEFAULT_GRACE_MS = 2_000

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const stringList = (value: unknown): string[] | undefined =>
  Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === "string") : undefined

const positiveNumber = (value: unknown): number | undefined => {
  const parsed = typeof value === "string" ? Number(value) : value
  return typeof parsed === "number" && Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

const parseDisplay = (value: unknown): DisplayMode | undefined =>
  value === "live" || value === "plain" ? value : undefined

const parseFlag = (value: unknown): boolean | undefined => {
  if (typeof value === "boolean") return value
  if (typeof value !== "string") return undefined
  const lower = value.trim().toLowerCase()
  if (lower === "1" || lower === "true" || lower === "yes") return true
  if (lower === "0" || lower === "false" || lower === "no") return false
  return undefined
}

const parseInstrumentation = (value: unknown, source: string): InstrumentationName | undefined => {
  if (typeof value !== "string" || value.trim().length === 0) return undefined
  const name = value.trim()
  if (isInstrumentationName(name)) return name
  warn("config", `Unknown instrumentation "${name}" in ${source}; ignoring`)
  return undefined
}

const stringMap = (value: unknown): Record<string, string> | undefined => {
  if (!isRecord(value)) return undefined
  const entries = Object.entries(value).filter((entry): entry is [string, string] => typeof entry[1] === "string")
  return Object.fromEntries(entries)
}

export const resolveConfigFilePath = (cwd: string, env: NodeJS.ProcessEnv): string => {
  const explicit = env.LINECHECK_CONFIG?.trim()
  return explicit ? path.resolve(cwd, explicit) : path.join(cwd, CONFIG_FILE_NAME)
}

export const loadConfigFileSync = (configPath: string): HarnessOverrides => {
  if (!fs.existsSync(configPath)) return {}
  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, "utf8"))
  } catch (error) {
    warn("config", `Failed to parse ${configPath}: ${describeError(error)}`)
    return {}
  }
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    warn("config", `${configPath} must contain a mapping; ignoring`)
    return {}
  }
  const baseDir = path.dirname(configPath)
  const overrides: HarnessOverrides = {}
  if (typeof parsed.engine === "string") overrides.enginePath = path.resolve(baseDir, parsed.engine)
  const engineArgs = stringList(parsed.engineArgs)
  if (engineArgs) overrides.engineArgs = engineArgs
  if (typeof parsed.cwd === "string") overrides.cwd = path.resolve(baseDir, parsed.cwd)
  const env = stringMap(parsed.env)
  if (env) overrides.env = env
  const timeoutMs = positiveNumber(parsed.timeoutMs)
  if (timeoutMs !== undefined) overrides.timeoutMs = timeoutMs
  const instrumentation = parseInstrumentation(parsed.instrumentation, configPath)
  if (instrumentation) overrides.instrumentation = instrumentation
  const suppressions = stringList(parsed.suppressions)
  if (suppressions) overrides.suppressions = suppressions
  const display = parseDisplay(parsed.display)
  if (display) overrides.display = display
  const color = parseFlag(parsed.color)
  if (color !== undefined) overrides.color = color
  const graceMs = positiveNumber(parsed.graceMs)
  if (graceMs !== undefined) overrides.graceMs = graceMs
  if (typeof parsed.quitCommand === "string") overrides.quitCommand = parsed.quitCommand
  return overrides
}

const fromEnvironment = (env: NodeJS.ProcessEnv): HarnessOverrides => {
  const overrides: HarnessOverrides = {}
  const enginePath = env.LINECHECK_ENGINE?.trim()
  if (enginePath) overrides.enginePath = enginePath
  const timeoutMs = positiveNumber(env.LINECHECK_TIMEOUT_MS)
  if (timeoutMs !== undefined) overrides.timeoutMs = timeoutMs
  const instrumentation = parseInstrumentation(env.LINECHECK_INSTRUMENT, "LINECHECK_INSTRUMENT")
  if (instrumentation) overrides.instrumentation = instrumentation
  const display = parseDisplay(env.LINECHECK_DISPLAY?.trim())
  if (display) overrides.display = display
  const color = parseFlag(env.LINECHECK_COLOR)
  if (color !== undefined) overrides.color = color
  return overrides
}

export interface LoadConfigOptions {
  readonly cwd?: string
  /** Defaults to `process.env` after loading `.env`. */
  readonly env?: NodeJS.ProcessEnv
}

/** Precedence: overrides (CLI) > environment > config file > defaults. */
export const loadHarnessConfig = (overrides: HarnessOverrides = {}, options: LoadConfigOptions = {}): HarnessConfig => {
  if (!options.env) {
    dotenv.config()
  }
  const env = options.env ?? process.env
  const cwd = path.resolve(options.cwd ?? process.cwd())
  const fileValues = loadConfigFileSync(resolveConfigFilePath(cwd, env))
  const layers: readonly HarnessOverrides[] = [overrides, fromEnvironment(env), fileValues]
  const pick = <K extends keyof HarnessConfig>(key: K): HarnessOverrides[K] => {
    for (const layer of layers) {
      const value = layer[key]
      if (value !== undefined) return value
    }
    return undefined
  }
  const enginePath = pick("enginePath")
  return {
    enginePath: enginePath ? path.resolve(cwd, enginePath) : undefined,
    engineArgs: pick("engineArgs") ?? [],
    cwd: pick("cwd") ?? cwd,
    env: pick("env") ?? {},
    timeoutMs: pick("timeoutMs") ?? DEFAULT_TIMEOUT_MS,
    instrumentation: pick("instrumentation") ?? "none",
    suppressions: pick("suppressions") ?? [],
    display: pick("display") ?? "live",
    color: pick("color") ?? true,
    graceMs: pick("graceMs") ?? DEFAULT_GRACE_MS,
    quitCommand: pick("quitCommand") ?? "quit",
  }
}
