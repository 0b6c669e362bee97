export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

// Raised for any non-2xx answer. The OCR pipeline treats this kind as recoverable
// on the image-analysis call; everywhere else it is fatal.
export class HttpStatusError extends Error {
  readonly status: number
  readonly url: string
  readonly body: string

  constructor(params: { label: string; status: number; url: string; body: string }) {
    super(`${params.label}: ${params.status} ${params.body}`.trim())
    this.name = 'HttpStatusError'
    this.status = params.status
    this.url = params.url
    this.body = params.body
  }
}

export class RequestTimeoutError extends Error {
  readonly timeoutMs: number

  constructor(label: string, timeoutMs: number) {
    super(`${label}: request timed out after ${timeoutMs}ms`)
    this.name = 'RequestTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export class MissingOperationLocationError extends Error {
  constructor() {
    super('Azure Read v3.2: missing Operation-Location header.')
    this.name = 'MissingOperationLocationError'
  }
}

export class OcrJobFailedError extends Error {
  readonly payload: unknown

  constructor(payload: unknown) {
    super(`Azure Read v3.2 failed: ${JSON.stringify(payload)}`)
    this.name = 'OcrJobFailedError'
    this.payload = payload
  }
}

export class OcrTimeoutError extends Error {
  readonly attempts: number

  constructor(attempts: number) {
    super('Azure Read v3.2 timed out while polling.')
    this.name = 'OcrTimeoutError'
    this.attempts = attempts
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
