import path from "node:path"
import { pathToFileURL } from "node:url"
import { SuiteRegistry } from "../suite/registry.js"
import type { SuiteDefinition } from "../suite/types.js"

export class SuiteModuleError extends Error {
  readonly modulePath: string

  constructor(modulePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "SuiteModuleError"
    this.modulePath = modulePath
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const isSuiteDefinition = (value: unknown): value is SuiteDefinition =>
  isRecord(value) && typeof value.name === "string" && Array.isArray(value.cases) && isRecord(value.hooks)

/** Reads a module's default export: one suite, or an array of them. */
export const suitesFromExport = (modulePath: string, exported: unknown): SuiteDefinition[] => {
  const candidates = Array.isArray(exported) ? exported : [exported]
  if (candidates.length === 0 || !candidates.every(isSuiteDefinition)) {
    throw new SuiteModuleError(
      modulePath,
      `${modulePath} must default-export a suite (defineSuite/suiteFromObject) or an array of suites`,
    )
  }
  return candidates
}

export const loadSuiteModules = async (modulePaths: readonly string[], cwd = process.cwd()): Promise<SuiteRegistry> => {
  const registry = new SuiteRegistry()
  for (const modulePath of modulePaths) {
    const resolved = path.resolve(cwd, modulePath)
    let loaded: unknown
    try {
      loaded = await import(pathToFileURL(resolved).href)
    } catch (error) {
      throw new SuiteModuleError(modulePath, `Failed to import ${modulePath}`, { cause: error })
    }
    const exported = isRecord(loaded) ? loaded.default : undefined
    for (const suite of suitesFromExport(modulePath, exported)) {
      registry.register(suite)
    }
  }
  return registry
}
