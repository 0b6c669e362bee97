import test from 'node:test'
import assert from 'node:assert/strict'
import { access, mkdtemp, readFile, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import type { TranscriberConfig } from './config.js'
import { HttpStatusError } from './errors.js'
import { jsonResponse, mockFetch, textResponse } from './testing/mockFetch.js'
import { resolveUserPath, transcribeNotebookPage } from './transcribe.js'

const baseConfig: TranscriberConfig = {
  azureEndpoint: 'https://vision.test',
  azureKey: 'test-key',
  cleanupApiKey: '',
  cleanupBaseUrl: 'https://llm.test',
  cleanupModel: 'gpt-4.1-mini',
  pollIntervalMs: 0,
  pollMaxAttempts: 3,
  requestTimeoutMs: 1000
}

async function setupImage() {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'transcribe-'))
  const imagePath = path.join(dir, 'page-07.jpg')
  await writeFile(imagePath, Buffer.from('jpeg-bytes'))
  return { dir, imagePath, outDir: path.join(dir, 'out') }
}

function visionOnly() {
  return jsonResponse({ readResult: { content: 'Oct 3\nwarm-up duet' } })
}

test('without a cleanup key the clean file repeats the raw text', async (t) => {
  const { imagePath, outDir } = await setupImage()
  const calls = mockFetch(t, visionOnly)

  const result = await transcribeNotebookPage({ imagePath, outDir, clean: true }, baseConfig)

  const rawPath = path.join(outDir, 'page-07.raw.txt')
  const cleanPath = path.join(outDir, 'page-07.clean.md')
  assert.deepEqual(result.writtenPaths, [rawPath, cleanPath])
  assert.equal(await readFile(rawPath, 'utf8'), 'Oct 3\nwarm-up duet')
  assert.equal(await readFile(cleanPath, 'utf8'), await readFile(rawPath, 'utf8'))
  assert.equal(result.cleanedText, 'Oct 3\nwarm-up duet')
  assert.equal(result.ocrSource, 'image-analysis')
  assert.equal(calls.length, 1)
})

test('with cleanup disabled only the raw file is written and the model is never called', async (t) => {
  const { imagePath, outDir } = await setupImage()
  const calls = mockFetch(t, visionOnly)

  const result = await transcribeNotebookPage(
    { imagePath, outDir, clean: false },
    { ...baseConfig, cleanupApiKey: 'test-secret' }
  )

  assert.deepEqual(result.writtenPaths, [path.join(outDir, 'page-07.raw.txt')])
  assert.equal(result.cleanedText, null)
  await assert.rejects(access(path.join(outDir, 'page-07.clean.md')))
  assert.equal(calls.some((call) => call.url.startsWith('https://llm.test')), false)
})

test('with a cleanup key the model output becomes the clean file', async (t) => {
  const { imagePath, outDir } = await setupImage()
  const calls = mockFetch(t, (request) => {
    if (request.url.startsWith('https://llm.test')) {
      return jsonResponse({ choices: [{ message: { content: ' # Oct 3\n\n- warm-up duet ' } }] })
    }
    return visionOnly()
  })

  const result = await transcribeNotebookPage(
    { imagePath, outDir, clean: true },
    { ...baseConfig, cleanupApiKey: 'test-secret' }
  )

  assert.equal(await readFile(path.join(outDir, 'page-07.raw.txt'), 'utf8'), 'Oct 3\nwarm-up duet')
  assert.equal(await readFile(path.join(outDir, 'page-07.clean.md'), 'utf8'), '# Oct 3\n\n- warm-up duet')
  assert.equal(result.cleanedText, '# Oct 3\n\n- warm-up duet')
  assert.equal(calls.length, 2)
})

test('a failed OCR run writes nothing', async (t) => {
  const { imagePath, outDir } = await setupImage()
  mockFetch(t, () => textResponse('server error', 500))

  await assert.rejects(
    transcribeNotebookPage({ imagePath, outDir, clean: true }, baseConfig),
    HttpStatusError
  )
  await assert.rejects(access(outDir))
})

test('resolveUserPath expands the home directory and resolves relative paths', () => {
  assert.equal(resolveUserPath('~'), os.homedir())
  assert.equal(resolveUserPath('~/notes/page.jpg'), path.join(os.homedir(), 'notes', 'page.jpg'))
  assert.equal(resolveUserPath('out'), path.resolve('out'))
})
