import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'

export type OutputPaths = {
  rawPath: string
  cleanPath: string
}

export function resolveOutputPaths(outDir: string, imagePath: string): OutputPaths {
  const stem = path.parse(imagePath).name
  return {
    rawPath: path.join(outDir, `${stem}.raw.txt`),
    cleanPath: path.join(outDir, `${stem}.clean.md`)
  }
}

// Existing files are overwritten.
export async function writeOutputText(filePath: string, text: string): Promise<string> {
  await mkdir(path.dirname(filePath), { recursive: true })
  await writeFile(filePath, text, 'utf8')
  return filePath
}
