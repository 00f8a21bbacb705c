export { DEFAULT_TIMEOUT_MS, LineExpectations, check, expectLines, fail, scan } from "./assert/expect.js"
export type { LineSource, ScanOptions, ScanPredicate } from "./assert/expect.js"
export { containsText, equalsLine, globLine, globToRegExp, matchGlob, startsWithText } from "./assert/matchers.js"
export type { LinePredicate } from "./assert/matchers.js"
export { loadHarnessConfig } from "./config/harnessConfig.js"
export type { DisplayMode, HarnessConfig, HarnessOverrides } from "./config/harnessConfig.js"
export { EngineProcess } from "./engine/engineProcess.js"
export type { BatchResult, EngineMode, EngineSpawnOptions, EngineState } from "./engine/engineProcess.js"
export { AssertionFailed, ProcessError, SetupError, TimedOut } from "./engine/errors.js"
export { resolveInstrumentation } from "./engine/instrumentation.js"
export type { Instrumentation, InstrumentationName } from "./engine/instrumentation.js"
export { AppendRenderer, InteractiveRenderer } from "./reporter/renderers.js"
export type { OutputSurface, RenderStrategy } from "./reporter/renderers.js"
export { Reporter, createReporter } from "./reporter/reporter.js"
export { Scheduler } from "./runner/scheduler.js"
export type { ReportListener, SchedulerOptions } from "./runner/scheduler.js"
export type { RunReport } from "./runner/report.js"
export { SuiteRegistry, defineSuite, suiteFromObject } from "./suite/registry.js"
export type { SuiteBuilder } from "./suite/registry.js"
export type { SuiteContext, SuiteDefinition, SuiteStep } from "./suite/types.js"
