import * as readline from 'readline'
import { AffirmationError, StorageError } from '../../src/lib/errors'
import { normalizeCollectionId } from '../../src/lib/importer'
import { fetchLine, importText, runAction } from './commands'
import type { CommandContext } from './commands'

export interface InteractiveIo {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
  error: NodeJS.WritableStream
}

export const COMMANDS_HINT =
  "Commands: 'next', 'random', 'collections', 'history', 'progress', 'use <id>', 'add', 'help', 'quit'"

const QUIT_COMMANDS = new Set(['quit', 'exit', 'q'])

/**
 * Prompt loop over the same operations as the one-shot flags. Each command
 * loads and saves the data file on its own. Operation errors are reported and
 * the loop goes on; storage errors end the session. Returns on quit or when
 * the input ends.
 */
export async function runInteractive(context: CommandContext, io: InteractiveIo): Promise<void> {
  const { write } = context
  const rl = readline.createInterface({ input: io.input, terminal: false })
  const lines = rl[Symbol.asyncIterator]()

  async function ask(prompt: string): Promise<string | null> {
    io.output.write(prompt)
    const next = await lines.next()
    return next.done ? null : next.value
  }

  async function addCollection(): Promise<void> {
    write('\nAdd a new collection:')
    const id = normalizeCollectionId((await ask('Collection ID (no spaces): ')) ?? '')
    const title = ((await ask('Collection title: ')) ?? '').trim()
    const kind = (await ask('Type (affirmations/song_lyrics/poem): ')) ?? ''

    write('\nPaste your markdown content (end with empty line):')
    const pasted: string[] = []
    for (;;) {
      const line = await ask('')
      if (line === null || !line.trim()) break
      pasted.push(line)
    }

    const collection = importText(context, { id, title, kind, rawText: pasted.join('\n') })
    write(`Added collection '${collection.title}' with ${collection.lines.length} lines!`)
  }

  async function handle(command: string, argument: string): Promise<void> {
    switch (command) {
      case '':
      case 'next':
      case 'n':
        write(fetchLine(context, 'sequential'))
        return
      case 'random':
      case 'r':
        write(fetchLine(context, 'random'))
        return
      case 'collections':
      case 'c':
        runAction({ command: 'collections' }, context)
        return
      case 'history':
      case 'h':
        runAction({ command: 'history' }, context)
        return
      case 'progress':
      case 'p':
        runAction({ command: 'progress' }, context)
        return
      case 'use':
      case 'u':
        if (!argument) {
          write('Usage: use <collection id>')
          return
        }
        runAction({ command: 'use', collectionId: argument }, context)
        return
      case 'add':
      case 'a':
        await addCollection()
        return
      case 'help':
      case '?':
        write(COMMANDS_HINT)
        return
      default:
        write(`Unknown command. ${COMMANDS_HINT}`)
    }
  }

  try {
    write('Welcome to your affirmations library!')
    write(COMMANDS_HINT)

    for (;;) {
      const answer = await ask('\nWhat would you like to do? ')
      if (answer === null) return

      const [word = '', ...rest] = answer.trim().split(/\s+/)
      const command = word.toLowerCase()
      if (QUIT_COMMANDS.has(command)) {
        write('Stay positive! See you next time!')
        return
      }

      try {
        await handle(command, rest.join(' '))
      } catch (err) {
        if (err instanceof StorageError || !(err instanceof AffirmationError)) throw err
        io.error.write(`Error: ${err.message}\n`)
      }
    }
  } finally {
    rl.close()
  }
}
