import { logInfo } from '../logger.js'
import { readJson, sendRequest } from './httpRequest.js'

export type CleanupConfig = {
  apiKey: string
  baseUrl: string
  model: string
  timeoutMs: number
}

const CLEANUP_RULES = [
  'You are cleaning OCR output from handwritten dance performance observation notebooks.',
  'Rules:',
  '- Preserve meaning; do not invent details.',
  '- Fix obvious OCR artifacts (broken words, random line breaks).',
  '- Keep original ordering.',
  '- Output as Markdown.',
  '- If a date is present, put it as a top-level heading.',
  '- Use bullets where appropriate.'
].join('\n')

export function buildCleanupPrompt(rawText: string) {
  return `${CLEANUP_RULES}\n\nOCR TEXT:\n${rawText}`
}

function extractTextFromChatContent(content: unknown): string {
  if (typeof content === 'string') return content.trim()
  if (!Array.isArray(content)) return ''

  const parts = content
    .map((part: unknown) => {
      if (!part || typeof part !== 'object' || !('text' in part)) return ''
      return typeof part.text === 'string' ? part.text : ''
    })
    .filter(Boolean)

  return parts.join('\n').trim()
}

function extractFirstChoiceContent(body: unknown): unknown {
  if (!body || typeof body !== 'object' || !('choices' in body) || !Array.isArray(body.choices)) return undefined
  const choice: unknown = body.choices[0]
  if (!choice || typeof choice !== 'object' || !('message' in choice)) return undefined
  const message: unknown = choice.message
  if (!message || typeof message !== 'object' || !('content' in message)) return undefined
  return message.content
}

// Without a key the raw text is handed back untouched and nothing is sent.
export async function cleanupOcrText(config: CleanupConfig, rawText: string): Promise<string> {
  if (!config.apiKey) {
    return rawText
  }

  logInfo('cleanup', `sending ${rawText.length} characters to ${config.model}`)
  const body = await sendRequest(`${config.baseUrl}/v1/chat/completions`, {
    method: 'POST',
    headers: {
      Authorization: `Bearer ${config.apiKey}`,
      'Content-Type': 'application/json'
    },
    body: JSON.stringify({
      model: config.model,
      messages: [
        { role: 'user', content: buildCleanupPrompt(rawText) }
      ]
    })
  }, {
    label: 'CLEANUP_FAILED',
    timeoutMs: config.timeoutMs,
    read: readJson
  })

  const cleaned = extractTextFromChatContent(extractFirstChoiceContent(body))
  if (!cleaned) {
    throw new Error('CLEANUP_EMPTY')
  }
  return cleaned
}
