import { Command, CommanderError } from 'commander'
import { loadTranscriberConfig, type TranscriberEnv } from './config.js'
import { describeError } from './errors.js'
import { logError, setVerboseLogging } from './logger.js'
import { transcribeNotebookPage } from './transcribe.js'

type CliOptions = {
  outdir: string
  clean: boolean
  verbose?: boolean
}

export function buildProgram(env: TranscriberEnv) {
  return new Command()
    .name('notebook-transcribe')
    .description('Transcribe a handwritten notebook page into raw text and cleaned Markdown')
    .argument('<image>', 'Path to an image (jpg/png) of a notebook page')
    .option('--outdir <dir>', 'Output directory', 'out')
    .option('--no-clean', 'Skip language-model cleanup')
    .option('--verbose', 'Log each pipeline step')
    .exitOverride()
    .action(async (image: string, options: CliOptions) => {
      setVerboseLogging(Boolean(options.verbose))
      const config = loadTranscriberConfig(env)

      const result = await transcribeNotebookPage({
        imagePath: image,
        outDir: options.outdir,
        clean: options.clean
      }, config)

      for (const filePath of result.writtenPaths) {
        console.log(`Wrote: ${filePath}`)
      }
    })
}

// Resolves to the process exit code. Commander reports its own usage errors.
export async function runCli(argv: string[], env: TranscriberEnv = process.env): Promise<number> {
  try {
    await buildProgram(env).parseAsync(argv, { from: 'user' })
    return 0
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    logError('notebook-transcriber', `failed: ${describeError(error)}`)
    return 1
  }
}
