import { Chalk, type ChalkInstance } from "chalk"

export type CaseStatus = "pending" | "running" | "passed" | "failed" | "timedOut"

export type TerminalCaseStatus = Extract<CaseStatus, "passed" | "failed" | "timedOut">

export interface FailureDetail {
  readonly message: string
  readonly trace: string
}

export interface CaseRecord {
  readonly suite: string
  readonly name: string
  readonly status: TerminalCaseStatus
  readonly durationMs: number
  readonly failure?: FailureDetail
}

export interface SuiteRecord {
  readonly name: string
  readonly lines: string[]
  readonly cases: CaseRecord[]
  failures: number
  finished: boolean
}

export interface RunReport {
  suitesPassed: number
  suitesFailed: number
  testsPassed: number
  testsFailed: number
  readonly suites: SuiteRecord[]
  readonly startedAt: number
  durationMs: number
}

export const createRunReport = (startedAt: number = Date.now()): RunReport => ({
  suitesPassed: 0,
  suitesFailed: 0,
  testsPassed: 0,
  testsFailed: 0,
  suites: [],
  startedAt,
  durationMs: 0,
})

export const createPalette = (color: boolean): ChalkInstance => new Chalk(color ? {} : { level: 0 })

const formatMs = (durationMs: number): string => `${durationMs.toFixed(2)}ms`

export const formatSuiteHeader = (palette: ChalkInstance, suite: string): string =>
  `${palette.bold("Test Suite:")} ${suite}`

export const formatSuccess = (palette: ChalkInstance, name: string, durationMs: number): string =>
  `    ${palette.green(`✓ ${name} (${formatMs(durationMs)})`)}`

export const formatFailure = (
  palette: ChalkInstance,
  name: string,
  durationMs: number,
  failure?: FailureDetail,
): string => {
  const head = `    ${palette.red(`✗ ${name} (${formatMs(durationMs)})`)}`
  if (!failure) return head
  const detail = [failure.message, ...failure.trace.split("\n")]
    .filter((line) => line.trim().length > 0)
    .map((line) => `      ${palette.cyan(line)}`)
  return [head, ...detail].join("\n")
}

export const formatCase = (palette: ChalkInstance, record: CaseRecord): string =>
  record.status === "passed"
    ? formatSuccess(palette, record.name, record.durationMs)
    : formatFailure(palette, record.name, record.durationMs, record.failure)

export const formatSummary = (palette: ChalkInstance, report: RunReport): string[] => {
  const seconds = Math.round(report.durationMs / 10) / 100
  const suiteTotal = report.suitesPassed + report.suitesFailed
  const testTotal = report.testsPassed + report.testsFailed
  return [
    "",
    palette.bold("Test Summary"),
    "",
    `    Test Suites: ${palette.green(`${report.suitesPassed} passed`)}, ${palette.red(`${report.suitesFailed} failed`)}, ${suiteTotal} total`,
    `    Tests:       ${palette.green(`${report.testsPassed} passed`)}, ${palette.red(`${report.testsFailed} failed`)}, ${testTotal} total`,
    `    Time:        ${seconds}s`,
    "",
  ]
}

/** Formats a thrown value as message plus the frames below it. */
export const describeFailure = (error: unknown): FailureDetail => {
  if (error instanceof Error) {
    const frames = (error.stack ?? "")
      .split("\n")
      .filter((line) => line.trimStart().startsWith("at "))
      .map((line) => line.trim())
    return { message: `${error.name}: ${error.message}`, trace: frames.join("\n") }
  }
  return { message: String(error), trace: "" }
}
