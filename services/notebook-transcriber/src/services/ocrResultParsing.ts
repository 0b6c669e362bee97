function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function records(value: unknown): Record<string, unknown>[] {
  if (!Array.isArray(value)) return []
  return value.filter(isRecord)
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined
}

function collectLineTexts(groups: Record<string, unknown>[]): string[] {
  const lines: string[] = []
  for (const group of groups) {
    for (const line of records(group.lines)) {
      const text = line.text
      if (typeof text === 'string' && text) {
        lines.push(text)
      }
    }
  }
  return lines
}

// Image Analysis 4.0: readResult.content, else readResult.blocks[].lines[].text
export function extractImageAnalysisText(body: unknown): string {
  const readResult = field(body, 'readResult')
  const content = field(readResult, 'content')
  if (typeof content === 'string' && content) {
    return content.trim()
  }

  return collectLineTexts(records(field(readResult, 'blocks'))).join('\n').trim()
}

// Read 3.2: analyzeResult.readResults[].lines[].text, one readResult per page
export function extractReadResultText(body: unknown): string {
  const pages = records(field(field(body, 'analyzeResult'), 'readResults'))
  return collectLineTexts(pages).join('\n').trim()
}

export function readOperationStatus(body: unknown): string {
  const status = field(body, 'status')
  return typeof status === 'string' ? status.toLowerCase() : ''
}
