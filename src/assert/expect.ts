import { AssertionFailed, ProcessError, TimedOut } from "../engine/errors.js"
import { debugLog } from "../util/log.js"
import { containsText, equalsLine, globLine, startsWithText } from "./matchers.js"

export const DEFAULT_TIMEOUT_MS = 300_000

/** Anything that hands out output lines one at a time, oldest first. */
export interface LineSource {
  readLine(signal?: AbortSignal): Promise<string>
}

/**
 * Decides when a scan stops. Returning `true` ends the scan on that line;
 * throwing fails the assertion immediately.
 */
export type ScanPredicate = (line: string) => boolean | void | Promise<boolean | void>

export interface ScanOptions {
  readonly timeoutMs?: number
}

const waitForAbort = (signal: AbortSignal): Promise<never> =>
  new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason)
      return
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true })
  })

const scanForward = async (source: LineSource, predicate: ScanPredicate, signal: AbortSignal): Promise<string> => {
  for (;;) {
    let line: string
    try {
      line = await source.readLine(signal)
    } catch (error) {
      // A closed stream is reported like any other miss: once the deadline passes.
      if (error instanceof ProcessError && error.code === "EndOfStream") {
        return waitForAbort(signal)
      }
      throw error
    }
    if ((await predicate(line)) === true) {
      return line
    }
  }
}

/**
 * Reads forward from the source's current position until `predicate` accepts
 * a line, and resolves with that line. Rejects with `TimedOut` when the
 * deadline passes first; the pending read is abandoned, the source itself is
 * left untouched.
 */
export const scan = async (
  source: LineSource,
  description: string,
  predicate: ScanPredicate,
  options: ScanOptions = {},
): Promise<string> => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const controller = new AbortController()
  const started = Date.now()
  let timer: ReturnType<typeof setTimeout> | undefined

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimedOut(description, Date.now() - started, timeoutMs)
      debugLog({ scanTimedOut: description, timeoutMs })
      controller.abort(error)
      reject(error)
    }, timeoutMs)
  })
  const task = scanForward(source, predicate, controller.signal)

  try {
    return await Promise.race([task, deadline])
  } finally {
    clearTimeout(timer)
  }
}

export class LineExpectations {
  constructor(
    private readonly source: LineSource,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
  ) {}

  equals(expected: string, options: ScanOptions = {}): Promise<string> {
    return this.run(`equals "${expected}"`, equalsLine(expected), options)
  }

  /** Glob match against the whole line. */
  expect(pattern: string, options: ScanOptions = {}): Promise<string> {
    return this.run(`expect "${pattern}"`, globLine(pattern), options)
  }

  contains(fragment: string, options: ScanOptions = {}): Promise<string> {
    return this.run(`contains "${fragment}"`, containsText(fragment), options)
  }

  startsWith(prefix: string, options: ScanOptions = {}): Promise<string> {
    return this.run(`startsWith "${prefix}"`, startsWithText(prefix), options)
  }

  checkOutput(callback: ScanPredicate, options: ScanOptions = {}): Promise<string> {
    return this.run("checkOutput", callback, options)
  }

  private run(description: string, predicate: ScanPredicate, options: ScanOptions): Promise<string> {
    return scan(this.source, description, predicate, { timeoutMs: options.timeoutMs ?? this.timeoutMs })
  }
}

export const expectLines = (source: LineSource, timeoutMs?: number): LineExpectations =>
  new LineExpectations(source, timeoutMs)

export const fail = (message: string, details: { actual?: unknown; expected?: unknown } = {}): never => {
  throw new AssertionFailed(message, details)
}

export function check(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new AssertionFailed(message)
  }
}
