export type ProcessErrorCode = "SpawnFailed" | "NotStarted" | "NotRunning" | "EndOfStream" | "PostCheckFailed"

export class ProcessError extends Error {
  readonly code: ProcessErrorCode
  readonly detail?: unknown

  constructor(code: ProcessErrorCode, message: string, detail?: unknown) {
    super(message)
    this.name = "ProcessError"
    this.code = code
    this.detail = detail
  }
}

/** Raised when a blocking scan reaches its deadline without a match. */
export class TimedOut extends Error {
  readonly description: string
  readonly elapsedMs: number
  readonly timeoutMs: number

  constructor(description: string, elapsedMs: number, timeoutMs: number) {
    super(`${description} timed out after ${(elapsedMs / 1000).toFixed(2)} seconds`)
    this.name = "TimedOut"
    this.description = description
    this.elapsedMs = elapsedMs
    this.timeoutMs = timeoutMs
  }
}

export class AssertionFailed extends Error {
  readonly actual?: unknown
  readonly expected?: unknown

  constructor(message: string, options: { actual?: unknown; expected?: unknown } = {}) {
    super(message)
    this.name = "AssertionFailed"
    this.actual = options.actual
    this.expected = options.expected
  }
}

export type HookName = "beforeAll" | "beforeEach" | "afterEach" | "afterAll" | "register"

export class SetupError extends Error {
  readonly hook: HookName
  readonly suite: string

  constructor(suite: string, hook: HookName, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "SetupError"
    this.hook = hook
    this.suite = suite
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message
  if (typeof error === "string") return error
  try {
    return JSON.stringify(error)
  } catch {
    return String(error)
  }
}
