import { readFile } from 'node:fs/promises'
import { HttpStatusError } from '../errors.js'
import { logInfo, logWarn } from '../logger.js'
import { runImageAnalysisRead } from './ocrProvider.js'
import { runReadJob, type ReadJobConfig } from './ocrReadJob.js'

export type OcrPipelineConfig = ReadJobConfig

export type OcrSource = 'image-analysis' | 'read-v3'

export type OcrPipelineResult = {
  text: string
  source: OcrSource
}

export async function recognizeImage(image: Buffer, config: OcrPipelineConfig): Promise<OcrPipelineResult> {
  try {
    const text = await runImageAnalysisRead({ image, config })
    if (text) {
      return { text, source: 'image-analysis' }
    }
    logInfo('ocr-pipeline', 'image analysis returned no text, trying Read 3.2')
  } catch (error) {
    if (!(error instanceof HttpStatusError)) {
      throw error
    }
    logWarn('ocr-pipeline', `image analysis unavailable (${error.status}), falling back to Read 3.2`)
  }

  const text = await runReadJob(image, config)
  return { text, source: 'read-v3' }
}

export async function runHandwritingOcr(params: {
  imagePath: string
  config: OcrPipelineConfig
}): Promise<OcrPipelineResult> {
  const image = await readFile(params.imagePath)
  logInfo('ocr-pipeline', `read ${image.length} bytes from ${params.imagePath}`)
  return recognizeImage(image, params.config)
}
