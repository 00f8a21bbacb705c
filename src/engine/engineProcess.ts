import { spawn, type ChildProcess } from "node:child_process"
import { constants } from "node:os"
import readline from "node:readline"
import type { Readable } from "node:stream"
import { debugLog } from "../util/log.js"
import { ProcessError, TimedOut } from "./errors.js"
import type { TranscriptCheck, TranscriptCheckResult } from "./instrumentation.js"
import { LineQueue } from "./lineQueue.js"

export type EngineMode = "interactive" | "batch"

export type EngineState =
  | { readonly kind: "unstarted" }
  | { readonly kind: "running"; readonly pid: number | undefined }
  | { readonly kind: "exited"; readonly code: number }
  | { readonly kind: "crashed"; readonly code: number; readonly reason: string }

export interface EngineSpawnOptions {
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string | undefined>>
  readonly quitCommand?: string
  /** How long `terminate()` waits after closing stdin before signalling. */
  readonly graceMs?: number
  readonly postCheck?: TranscriptCheck
  /** Batch mode only: kill the program and raise `TimedOut` past this. */
  readonly batchTimeoutMs?: number
}

export interface BatchResult {
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
  readonly lines: readonly string[]
}

const DEFAULT_GRACE_MS = 2_000
const KILL_WAIT_MS = 1_000
// Shell convention for "command could not be run".
const SPAWN_FAILURE_CODE = 127

const within = (promise: Promise<unknown>, timeoutMs: number): Promise<boolean> =>
  new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs)
    void promise.then(() => {
      clearTimeout(timer)
      resolve(true)
    })
  })

const signalExitCode = (signal: NodeJS.Signals): number => 128 + (constants.signals[signal] ?? 0)

export class EngineProcess {
  private child: ChildProcess | null = null
  private modeValue: EngineMode | null = null
  private stateValue: EngineState = { kind: "unstarted" }
  private readonly queue = new LineQueue()
  private readonly transcriptLines: string[] = []
  private exitPromise: Promise<number> = Promise.resolve(0)
  private outputClosed: Promise<void> = Promise.resolve()
  private terminatePromise: Promise<number> | null = null
  private signalledByUs = false
  private batch: BatchResult | null = null

  constructor(private readonly options: EngineSpawnOptions = {}) {}

  static async open(
    prefix: readonly string[],
    executable: string,
    args: readonly string[] = [],
    options: EngineSpawnOptions = {},
  ): Promise<EngineProcess> {
    const engine = new EngineProcess(options)
    await engine.start(prefix, executable, args, "interactive")
    return engine
  }

  static async runBatch(
    prefix: readonly string[],
    executable: string,
    args: readonly string[] = [],
    options: EngineSpawnOptions = {},
  ): Promise<BatchResult> {
    const engine = new EngineProcess(options)
    await engine.start(prefix, executable, args, "batch")
    return engine.batchResult
  }

  get state(): EngineState {
    return this.stateValue
  }

  get mode(): EngineMode | null {
    return this.modeValue
  }

  get pid(): number | undefined {
    return this.child?.pid
  }

  get exitCode(): number | null {
    const state = this.stateValue
    return state.kind === "exited" || state.kind === "crashed" ? state.code : null
  }

  get transcript(): readonly string[] {
    return this.transcriptLines
  }

  get batchResult(): BatchResult {
    if (!this.batch) {
      throw new ProcessError("NotStarted", "No batch run has completed on this process")
    }
    return this.batch
  }

  async start(prefix: readonly string[], executable: string, args: readonly string[], mode: EngineMode): Promise<void> {
    if (this.stateValue.kind !== "unstarted") {
      throw new ProcessError("NotRunning", "Process was already started")
    }
    const argv = [...prefix, executable, ...args]
    const [command, ...rest] = argv
    if (!command) {
      throw new ProcessError("SpawnFailed", "Empty command line")
    }
    this.modeValue = mode
    debugLog({ engineStart: argv, mode })

    const child = spawn(command, rest, {
      cwd: this.options.cwd,
      env: { ...process.env, ...this.options.env },
      stdio: [mode === "interactive" ? "pipe" : "ignore", "pipe", "pipe"],
    })
    this.child = child
    this.exitPromise = this.trackExit(child)

    const { stdout, stderr } = child
    if (!stdout || !stderr) {
      throw new ProcessError("SpawnFailed", `No output pipes for ${command}`)
    }
    const captured = { stdout: "", stderr: "" }
    if (mode === "batch") {
      stdout.setEncoding("utf8")
      stderr.setEncoding("utf8")
      stdout.on("data", (chunk: string) => {
        captured.stdout += chunk
      })
      stderr.on("data", (chunk: string) => {
        captured.stderr += chunk
      })
    }
    const outputClosed = this.pipeLines([stdout, stderr])
    this.outputClosed = outputClosed
    child.stdin?.on("error", (error) => {
      debugLog({ engineStdinError: String(error), pid: child.pid })
    })

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off("error", onError)
        this.stateValue = { kind: "running", pid: child.pid }
        resolve()
      }
      const onError = (error: Error) => {
        child.off("spawn", onSpawn)
        this.stateValue = { kind: "crashed", code: SPAWN_FAILURE_CODE, reason: error.message }
        this.queue.close()
        reject(new ProcessError("SpawnFailed", `Failed to start ${command}: ${error.message}`, error))
      }
      child.once("spawn", onSpawn)
      child.once("error", onError)
    })

    if (mode === "batch") {
      const exitCode = await this.awaitBatch(outputClosed)
      const lines: string[] = []
      for (;;) {
        const line = await this.queue.next()
        if (line === null) break
        lines.push(line)
      }
      this.transcriptLines.push(...lines)
      this.batch = { exitCode, stdout: captured.stdout, stderr: captured.stderr, lines }
    }
  }

  sendCommand(text: string): void {
    if (this.stateValue.kind === "unstarted") {
      throw new ProcessError("NotStarted", "Process is not started")
    }
    const stdin = this.child?.stdin
    if (this.stateValue.kind !== "running" || !stdin || !stdin.writable || this.terminatePromise) {
      throw new ProcessError("NotRunning", `Cannot send "${text}": process input is closed`)
    }
    debugLog({ engineSend: text, pid: this.child?.pid })
    stdin.write(`${text}\n`)
  }

  quit(): void {
    this.sendCommand(this.options.quitCommand ?? "quit")
  }

  async readLine(signal?: AbortSignal): Promise<string> {
    if (this.stateValue.kind === "unstarted") {
      throw new ProcessError("NotStarted", "Process is not started")
    }
    const raw = await this.queue.next(signal)
    if (raw === null) {
      throw new ProcessError("EndOfStream", "Process output closed")
    }
    this.transcriptLines.push(raw)
    return raw.trim()
  }

  async *lines(signal?: AbortSignal): AsyncGenerator<string, never, undefined> {
    for (;;) {
      yield await this.readLine(signal)
    }
  }

  /**
   * Runs the instrumentation post-check over everything the process has
   * printed so far, read or not, without consuming any of it.
   */
  verify(): TranscriptCheckResult {
    const check = this.options.postCheck
    if (!check) return { ok: true }
    return check([...this.transcriptLines, ...this.queue.peek()])
  }

  async terminate(): Promise<number> {
    if (!this.child) {
      return this.exitCode ?? 0
    }
    if (!this.terminatePromise) {
      this.terminatePromise = this.shutdown(this.child)
    }
    return this.terminatePromise
  }

  private async shutdown(child: ChildProcess): Promise<number> {
    if (this.exitCode === null) {
      child.stdin?.end()
      const graceMs = this.options.graceMs ?? DEFAULT_GRACE_MS
      if (!(await this.waitForExit(graceMs))) {
        this.sendSignal(child, "SIGTERM")
        if (!(await this.waitForExit(KILL_WAIT_MS))) {
          this.sendSignal(child, "SIGKILL")
        }
      }
    }
    const code = await this.exitPromise
    // Let output written just before exit reach the queue.
    await within(this.outputClosed, KILL_WAIT_MS)
    child.stdout?.destroy()
    child.stderr?.destroy()
    this.queue.close()
    debugLog({ engineTerminated: child.pid, code })
    return code
  }

  private sendSignal(child: ChildProcess, signal: NodeJS.Signals): void {
    this.signalledByUs = true
    try {
      child.kill(signal)
    } catch (error) {
      debugLog({ engineKillError: String(error), pid: child.pid, signal })
    }
  }

  private waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exitCode !== null) return Promise.resolve(true)
    return within(this.exitPromise, timeoutMs)
  }

  private trackExit(child: ChildProcess): Promise<number> {
    return new Promise<number>((resolve) => {
      child.once("exit", (code, signal) => {
        if (code !== null) {
          this.stateValue = { kind: "exited", code }
          resolve(code)
          return
        }
        const signalCode = signal ? signalExitCode(signal) : SPAWN_FAILURE_CODE
        this.stateValue = this.signalledByUs
          ? { kind: "exited", code: signalCode }
          : { kind: "crashed", code: signalCode, reason: `killed by ${signal ?? "unknown signal"}` }
        resolve(signalCode)
      })
      child.on("error", (error) => {
        debugLog({ engineError: String(error), pid: child.pid })
        if (this.stateValue.kind !== "running") resolve(SPAWN_FAILURE_CODE)
      })
    })
  }

  private pipeLines(streams: readonly Readable[]): Promise<void> {
    let open = streams.length
    return new Promise<void>((resolve) => {
      for (const stream of streams) {
        const reader = readline.createInterface({ input: stream, crlfDelay: Infinity })
        reader.on("line", (line) => this.queue.push(line))
        reader.once("close", () => {
          open -= 1
          if (open === 0) {
            this.queue.close()
            resolve()
          }
        })
      }
    })
  }

  private async awaitBatch(outputClosed: Promise<void>): Promise<number> {
    const timeoutMs = this.options.batchTimeoutMs
    const finished = Promise.all([this.exitPromise, outputClosed]).then(([code]) => code)
    if (timeoutMs === undefined || timeoutMs <= 0) {
      return finished
    }
    const started = Date.now()
    let timer: ReturnType<typeof setTimeout> | undefined
    const expired = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeoutMs)
    })
    const outcome = await Promise.race([finished, expired])
    clearTimeout(timer)
    if (outcome === null) {
      const child = this.child
      if (child) {
        this.sendSignal(child, "SIGKILL")
      }
      await this.exitPromise
      throw new TimedOut("batch run", Date.now() - started, timeoutMs)
    }
    return outcome
  }
}
