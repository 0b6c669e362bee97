let verbose = false

export function setVerboseLogging(enabled: boolean) {
  verbose = enabled
}

export function logInfo(scope: string, message: string) {
  if (!verbose) return
  console.log(`[${scope}] ${message}`)
}

export function logWarn(scope: string, message: string) {
  console.warn(`[${scope}] ${message}`)
}

export function logError(scope: string, message: string) {
  console.error(`[${scope}] ${message}`)
}
