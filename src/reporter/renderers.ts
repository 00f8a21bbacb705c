import stripAnsi from "strip-ansi"
import type { RunReport, SuiteRecord } from "../runner/report.js"

const LINE_UP = "\u001b[1A"
const LINE_CLEAR = "\u001b[2K"

export interface OutputSurface {
  write(text: string): unknown
  /** Terminal width, when known; used to count wrapped rows. */
  readonly columns?: number
}

export interface RenderStrategy {
  render(report: Readonly<RunReport>, surface: OutputSurface): void
}

export const flattenLines = (report: Readonly<RunReport>): string[] =>
  report.suites.flatMap((suite) => suite.lines).flatMap((entry) => entry.split("\n"))

export const countRows = (lines: readonly string[], columns?: number): number => {
  if (!columns || columns <= 0) return lines.length
  return lines.reduce((rows, line) => rows + Math.max(1, Math.ceil(stripAnsi(line).length / columns)), 0)
}

/** Redraws the whole dashboard in place, erasing what it printed last time. */
export class InteractiveRenderer implements RenderStrategy {
  private printedRows = 0

  render(report: Readonly<RunReport>, surface: OutputSurface): void {
    const lines = flattenLines(report)
    const erase = `${LINE_UP}${LINE_CLEAR}`.repeat(this.printedRows)
    const body = lines.map((line) => `${line}\n`).join("")
    surface.write(`${erase}${body}`)
    this.printedRows = countRows(lines, surface.columns)
  }
}

/**
 * Never moves the cursor. Each suite's block is written once, after the
 * suite has finished, so concurrent suites do not interleave.
 */
export class AppendRenderer implements RenderStrategy {
  private readonly written = new WeakSet<SuiteRecord>()

  render(report: Readonly<RunReport>, surface: OutputSurface): void {
    for (const suite of report.suites) {
      if (!suite.finished || this.written.has(suite)) continue
      this.written.add(suite)
      surface.write(suite.lines.map((line) => `${line}\n`).join(""))
    }
  }
}
