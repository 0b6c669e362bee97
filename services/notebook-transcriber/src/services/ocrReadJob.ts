import { setTimeout as sleep } from 'node:timers/promises'
import { MissingOperationLocationError, OcrJobFailedError, OcrTimeoutError } from '../errors.js'
import { logInfo } from '../logger.js'
import { readJson, sendRequest } from './httpRequest.js'
import { azureHeaders, type OcrProviderConfig } from './ocrProvider.js'
import { extractReadResultText, readOperationStatus } from './ocrResultParsing.js'

export type ReadJobConfig = OcrProviderConfig & {
  pollIntervalMs: number
  pollMaxAttempts: number
}

function readAnalyzeUrl(endpoint: string) {
  return `${endpoint}/vision/v3.2/read/analyze`
}

async function submitReadJob(image: Buffer, config: ReadJobConfig): Promise<string> {
  const operationLocation = await sendRequest(readAnalyzeUrl(config.endpoint), {
    method: 'POST',
    headers: azureHeaders(config.apiKey),
    body: image
  }, {
    label: 'READ_SUBMIT_FAILED',
    timeoutMs: config.timeoutMs,
    read: async (response) => {
      const location = response.headers.get('Operation-Location')
      await response.body?.cancel()
      return location
    }
  })

  if (!operationLocation) {
    throw new MissingOperationLocationError()
  }
  return operationLocation
}

// Legacy Read 3.2 flow: submit, then poll the Operation-Location until the job is
// terminal or the attempt budget runs out. Every poll waits first.
export async function runReadJob(image: Buffer, config: ReadJobConfig): Promise<string> {
  const operationLocation = await submitReadJob(image, config)
  logInfo('read-v3', `job submitted, polling ${operationLocation}`)

  for (let attempt = 1; attempt <= config.pollMaxAttempts; attempt += 1) {
    await sleep(config.pollIntervalMs)

    const result = await sendRequest(operationLocation, {
      method: 'GET',
      headers: { 'Ocp-Apim-Subscription-Key': config.apiKey }
    }, {
      label: 'READ_POLL_FAILED',
      timeoutMs: config.timeoutMs,
      read: readJson
    })

    const status = readOperationStatus(result)
    if (status === 'succeeded') {
      logInfo('read-v3', `job succeeded after ${attempt} poll(s)`)
      return extractReadResultText(result)
    }
    if (status === 'failed') {
      throw new OcrJobFailedError(result)
    }
    logInfo('read-v3', `poll ${attempt}/${config.pollMaxAttempts}: ${status || 'unknown'}`)
  }

  throw new OcrTimeoutError(config.pollMaxAttempts)
}
