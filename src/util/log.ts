const DEBUG_ENV = "LINECHECK_DEBUG"

export const isDebugEnabled = (): boolean =>
  process.env[DEBUG_ENV] === "1" || process.env[DEBUG_ENV] === "true"

export const debugLog = (payload: Record<string, unknown>): void => {
  if (isDebugEnabled()) {
    console.error(JSON.stringify(payload))
  }
}

export const warn = (tag: string, message: string): void => {
  console.warn(`[${tag}] ${message}`)
}
