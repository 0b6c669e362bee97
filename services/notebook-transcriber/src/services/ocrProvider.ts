import { readJson, sendRequest } from './httpRequest.js'
import { extractImageAnalysisText } from './ocrResultParsing.js'

const IMAGE_ANALYSIS_API_VERSION = '2023-02-01-preview'

export type OcrProviderConfig = {
  endpoint: string
  apiKey: string
  timeoutMs: number
}

export type OcrProviderInput = {
  image: Buffer
  config: OcrProviderConfig
}

export function azureHeaders(apiKey: string) {
  return {
    'Ocp-Apim-Subscription-Key': apiKey,
    'Content-Type': 'application/octet-stream'
  }
}

function imageAnalysisUrl(endpoint: string) {
  const query = new URLSearchParams({ 'api-version': IMAGE_ANALYSIS_API_VERSION, features: 'read' })
  return `${endpoint}/computervision/imageanalysis:analyze?${query.toString()}`
}

// Synchronous Image Analysis call with the `read` feature. An empty string means the
// service answered but recognized nothing.
export async function runImageAnalysisRead(input: OcrProviderInput): Promise<string> {
  const body = await sendRequest(imageAnalysisUrl(input.config.endpoint), {
    method: 'POST',
    headers: azureHeaders(input.config.apiKey),
    body: input.image
  }, {
    label: 'IMAGE_ANALYSIS_FAILED',
    timeoutMs: input.config.timeoutMs,
    read: readJson
  })

  return extractImageAnalysisText(body)
}
