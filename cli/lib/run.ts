import { CLI_NAME, EXIT_CODE } from '../../shared/cli-contract'
import type { ExitCode } from '../../shared/cli-contract'
import { AffirmationError, getErrorMessage } from '../../src/lib/errors'
import { UsageError, parseCliArgs } from './args'
import { exitCodeForError, runAction } from './commands'
import type { CommandContext } from './commands'
import { resolveConfig } from './config'
import { runInteractive } from './interactive'
import { createFileStore } from './store'

export interface CliEnvironment {
  env: NodeJS.ProcessEnv
  stdin: NodeJS.ReadableStream
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  homeDir?: string
  cwd?: string
  now?: () => number
  random?: () => number
}

function lineWriter(stream: NodeJS.WritableStream): (text: string) => void {
  return (text) => {
    stream.write(`${text}\n`)
  }
}

/**
 * Run one invocation and return its exit code. Errors are reported on stderr.
 */
export async function runCli(argv: string[], environment: CliEnvironment): Promise<ExitCode> {
  const { env, stdin, stdout, stderr, homeDir, cwd, now, random } = environment
  const writeError = lineWriter(stderr)

  try {
    const { action, file } = parseCliArgs(argv)
    const config = resolveConfig({ env, homeDir, cwd, file })
    const context: CommandContext = {
      store: createFileStore(config.dataFile),
      config,
      write: lineWriter(stdout),
      now,
      random,
    }

    if (action.command === 'interactive') {
      await runInteractive(context, { input: stdin, output: stdout, error: stderr })
    } else {
      runAction(action, context)
    }
    return EXIT_CODE.SUCCESS
  } catch (err) {
    writeError(`Error: ${getErrorMessage(err, 'Unexpected failure')}`)
    if (err instanceof UsageError) {
      writeError(`Run '${CLI_NAME} --help' for usage.`)
    } else if (!(err instanceof AffirmationError)) {
      console.error(`[${CLI_NAME}] Unexpected failure:`, err)
    }
    return exitCodeForError(err)
  }
}
