import type { ChalkInstance } from "chalk"
import type { DisplayMode } from "../config/harnessConfig.js"
import { createPalette, formatSummary, type RunReport } from "../runner/report.js"
import type { ReportListener } from "../runner/scheduler.js"
import { AppendRenderer, InteractiveRenderer, type OutputSurface, type RenderStrategy } from "./renderers.js"

export interface ReporterOptions {
  readonly display: DisplayMode
  readonly color: boolean
  readonly surface?: OutputSurface
}

export class Reporter implements ReportListener {
  private summarized = false

  constructor(
    private readonly surface: OutputSurface,
    private readonly strategy: RenderStrategy,
    private readonly palette: ChalkInstance,
  ) {}

  update(report: Readonly<RunReport>): void {
    this.strategy.render(report, this.surface)
  }

  finish(report: Readonly<RunReport>): void {
    if (this.summarized) return
    this.summarized = true
    this.strategy.render(report, this.surface)
    this.surface.write(formatSummary(this.palette, report).map((line) => `${line}\n`).join(""))
  }
}

export const createRenderStrategy = (display: DisplayMode): RenderStrategy =>
  display === "live" ? new InteractiveRenderer() : new AppendRenderer()

export const createReporter = (options: ReporterOptions): Reporter =>
  new Reporter(options.surface ?? process.stdout, createRenderStrategy(options.display), createPalette(options.color))
