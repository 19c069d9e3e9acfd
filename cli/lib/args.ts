import { parseArgs } from 'util'
import type { SelectionMode } from '../../src/types'
import { CLI_NAME } from '../../shared/cli-contract'

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export type CliAction =
  | { command: 'next'; mode: SelectionMode; collectionId?: string }
  | { command: 'collections' }
  | { command: 'history'; limit?: number }
  | { command: 'progress' }
  | { command: 'use'; collectionId: string }
  | { command: 'import'; filePath: string; id: string; title: string; kind: string }
  | { command: 'interactive' }
  | { command: 'help' }
  | { command: 'version' }

export interface ParsedCli {
  action: CliAction
  file?: string
}

export const HELP_TEXT = `Usage: ${CLI_NAME} [options]

Prints the next line of the active collection when run without options.

Options:
  -r, --random            print a random line instead of the next one
      --collection <id>   read from this collection instead of the active one
  -c, --collections       list collections
      --history           show recent history
  -n, --limit <count>     number of history entries to show
  -p, --progress          show progress through the active collection
      --use <id>          make <id> the active collection
      --import <path>     import a markdown file as a collection (needs --id)
      --id <id>           collection id for --import
      --title <title>     collection title for --import (defaults to the id)
      --kind <kind>       affirmations, song_lyrics or poem (default affirmations)
  -i, --interactive       start the interactive prompt
  -f, --file <path>       data file to use
  -h, --help              show this help
  -v, --version           show the version`

const OPTIONS = {
  random: { type: 'boolean', short: 'r' },
  collection: { type: 'string' },
  collections: { type: 'boolean', short: 'c' },
  history: { type: 'boolean' },
  limit: { type: 'string', short: 'n' },
  progress: { type: 'boolean', short: 'p' },
  use: { type: 'string' },
  import: { type: 'string' },
  id: { type: 'string' },
  title: { type: 'string' },
  kind: { type: 'string' },
  interactive: { type: 'boolean', short: 'i' },
  file: { type: 'string', short: 'f' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
} as const

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err))
  }
}

function parseLimit(rawValue: string): number {
  const parsed = Number(rawValue)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`--limit expects a positive whole number, got "${rawValue}"`)
  }
  return parsed
}

/**
 * Map command-line flags to one action. When several action flags are given,
 * the first in this order wins: help, version, import, use, random,
 * collections, history, progress, interactive.
 */
export function parseCliArgs(argv: string[]): ParsedCli {
  const values = readFlags(argv)
  const file = values.file
  const withFile = (action: CliAction): ParsedCli => (file !== undefined ? { action, file } : { action })

  if (values.help) return withFile({ command: 'help' })
  if (values.version) return withFile({ command: 'version' })

  if (values.import !== undefined) {
    if (values.id === undefined) {
      throw new UsageError('--import requires --id')
    }
    return withFile({
      command: 'import',
      filePath: values.import,
      id: values.id,
      title: values.title ?? values.id,
      kind: values.kind ?? '',
    })
  }

  if (values.use !== undefined) return withFile({ command: 'use', collectionId: values.use })

  if (values.random) {
    return withFile({
      command: 'next',
      mode: 'random',
      ...(values.collection !== undefined ? { collectionId: values.collection } : {}),
    })
  }

  if (values.collections) return withFile({ command: 'collections' })

  if (values.history) {
    return withFile({
      command: 'history',
      ...(values.limit !== undefined ? { limit: parseLimit(values.limit) } : {}),
    })
  }

  if (values.progress) return withFile({ command: 'progress' })
  if (values.interactive) return withFile({ command: 'interactive' })

  return withFile({
    command: 'next',
    mode: 'sequential',
    ...(values.collection !== undefined ? { collectionId: values.collection } : {}),
  })
}
