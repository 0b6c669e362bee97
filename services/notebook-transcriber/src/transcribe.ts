import os from 'node:os'
import path from 'node:path'
import type { TranscriberConfig } from './config.js'
import { cleanupOcrText } from './services/cleanupLlm.js'
import { runHandwritingOcr, type OcrSource } from './services/ocrPipeline.js'
import { resolveOutputPaths, writeOutputText } from './services/outputWriter.js'

export type TranscribeOptions = {
  imagePath: string
  outDir: string
  clean: boolean
}

export type TranscribeResult = {
  cleanedText: string | null
  ocrSource: OcrSource
  writtenPaths: string[]
}

export function resolveUserPath(value: string) {
  if (value === '~') return os.homedir()
  if (value.startsWith('~/') || value.startsWith(`~${path.sep}`)) {
    return path.resolve(os.homedir(), value.slice(2))
  }
  return path.resolve(value)
}

export async function transcribeNotebookPage(
  options: TranscribeOptions,
  config: TranscriberConfig
): Promise<TranscribeResult> {
  const imagePath = resolveUserPath(options.imagePath)
  const outDir = resolveUserPath(options.outDir)
  const paths = resolveOutputPaths(outDir, imagePath)

  const ocr = await runHandwritingOcr({
    imagePath,
    config: {
      endpoint: config.azureEndpoint,
      apiKey: config.azureKey,
      timeoutMs: config.requestTimeoutMs,
      pollIntervalMs: config.pollIntervalMs,
      pollMaxAttempts: config.pollMaxAttempts
    }
  })

  const writtenPaths = [await writeOutputText(paths.rawPath, ocr.text)]

  if (!options.clean) {
    return { cleanedText: null, ocrSource: ocr.source, writtenPaths }
  }

  const cleanedText = await cleanupOcrText({
    apiKey: config.cleanupApiKey,
    baseUrl: config.cleanupBaseUrl,
    model: config.cleanupModel,
    timeoutMs: config.requestTimeoutMs
  }, ocr.text)
  writtenPaths.push(await writeOutputText(paths.cleanPath, cleanedText))

  return { cleanedText, ocrSource: ocr.source, writtenPaths }
}
