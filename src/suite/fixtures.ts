import { promises as fs } from "node:fs"
import { tmpdir } from "node:os"
import path from "node:path"
import type { FixtureDefinition } from "./types.js"

const slug = (value: string): string => value.replace(/[^A-Za-z0-9_-]+/g, "-").slice(0, 40) || "suite"

export const createScratchDir = (suite: string): Promise<string> =>
  fs.mkdtemp(path.join(tmpdir(), `linecheck-${slug(suite)}-`))

/** True for a relative path that stays inside the directory it is resolved against. */
export const isContainedPath = (name: string): boolean => {
  const normalized = path.normalize(name)
  return (
    normalized !== "." &&
    normalized !== ".." &&
    !path.isAbsolute(normalized) &&
    !normalized.startsWith(`..${path.sep}`)
  )
}

export const resolveFixturePath = (scratchDir: string, name: string): string => {
  if (!isContainedPath(name)) {
    throw new Error(`Fixture path escapes the scratch directory: ${name}`)
  }
  return path.resolve(scratchDir, name)
}

export const writeFixtures = async (scratchDir: string, fixtures: readonly FixtureDefinition[]): Promise<void> => {
  for (const fixture of fixtures) {
    const target = resolveFixturePath(scratchDir, fixture.name)
    await fs.mkdir(path.dirname(target), { recursive: true })
    await fs.writeFile(target, fixture.content, "utf8")
  }
}

export const removeScratchDir = (scratchDir: string): Promise<void> =>
  fs.rm(scratchDir, { recursive: true, force: true })
