import { HttpStatusError, RequestTimeoutError } from '../errors.js'

export type SendRequestOptions<T> = {
  label: string
  timeoutMs: number
  read: (response: Response) => Promise<T>
}

// The timeout covers both the round trip and reading the body.
export async function sendRequest<T>(url: string, init: RequestInit, options: SendRequestOptions<T>): Promise<T> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs)

  try {
    const response = await fetch(url, { ...init, signal: controller.signal })

    if (!response.ok) {
      const body = await response.text()
      throw new HttpStatusError({ label: options.label, status: response.status, url, body })
    }

    return await options.read(response)
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new RequestTimeoutError(options.label, options.timeoutMs)
    }
    throw error
  } finally {
    clearTimeout(timeout)
  }
}

export function readJson(response: Response): Promise<unknown> {
  return response.json()
}
