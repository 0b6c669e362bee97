import { ConfigError } from './errors.js'

const DEFAULT_CLEANUP_BASE_URL = 'https://api.openai.com'
const DEFAULT_CLEANUP_MODEL = 'gpt-4.1-mini'
const DEFAULT_POLL_INTERVAL_MS = 500
const DEFAULT_POLL_MAX_ATTEMPTS = 60
const DEFAULT_HTTP_TIMEOUT_MS = 60000

export type TranscriberConfig = {
  azureEndpoint: string
  azureKey: string
  cleanupApiKey: string
  cleanupBaseUrl: string
  cleanupModel: string
  pollIntervalMs: number
  pollMaxAttempts: number
  requestTimeoutMs: number
}

// Largest delay setTimeout accepts; anything above fires after 1ms.
const MAX_TIMER_MS = 2147483647

export type TranscriberEnv = Record<string, string | undefined>

function normalizeBaseUrl(value: string) {
  return value.replace(/\/+$/, '')
}

function readString(env: TranscriberEnv, key: string) {
  return String(env[key] || '').trim()
}

function requireString(env: TranscriberEnv, key: string) {
  const value = readString(env, key)
  if (!value) {
    throw new ConfigError(`Missing ${key}`)
  }
  return value
}

// Zero is accepted for the poll interval so tests and local stubs can poll without waiting.
function readNonNegativeInt(env: TranscriberEnv, key: string, fallback: number, min: number) {
  const raw = readString(env, key)
  if (!raw) return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min || value > MAX_TIMER_MS) return fallback
  return value
}

export function loadTranscriberConfig(env: TranscriberEnv = process.env): TranscriberConfig {
  return {
    azureEndpoint: normalizeBaseUrl(requireString(env, 'AZURE_VISION_ENDPOINT')),
    azureKey: requireString(env, 'AZURE_VISION_KEY'),
    cleanupApiKey: readString(env, 'OPENAI_API_KEY'),
    cleanupBaseUrl: normalizeBaseUrl(readString(env, 'OPENAI_BASE_URL') || DEFAULT_CLEANUP_BASE_URL),
    cleanupModel: readString(env, 'CLEANUP_MODEL') || DEFAULT_CLEANUP_MODEL,
    pollIntervalMs: readNonNegativeInt(env, 'OCR_POLL_INTERVAL_MS', DEFAULT_POLL_INTERVAL_MS, 0),
    pollMaxAttempts: readNonNegativeInt(env, 'OCR_POLL_MAX_ATTEMPTS', DEFAULT_POLL_MAX_ATTEMPTS, 1),
    requestTimeoutMs: readNonNegativeInt(env, 'HTTP_TIMEOUT_MS', DEFAULT_HTTP_TIMEOUT_MS, 1)
  }
}
