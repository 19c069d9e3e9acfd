import * as fs from 'fs'
import type { Collection, SelectionMode } from '../../src/types'
import { resolveActiveCollectionId, setActiveCollection } from '../../src/lib/activeCollection'
import { CollectionNotFoundError, ImportFileError, StorageError } from '../../src/lib/errors'
import { importCollection, parseCollectionKind } from '../../src/lib/importer'
import { activeProgress, listCollections, recentHistory } from '../../src/lib/reporting'
import { formatCollectionList, formatHistory, formatProgress } from '../../src/lib/reportFormatting'
import { selectNext } from '../../src/lib/selector'
import { CLI_NAME, CLI_VERSION, EXIT_CODE } from '../../shared/cli-contract'
import type { ExitCode } from '../../shared/cli-contract'
import { HELP_TEXT, UsageError } from './args'
import type { CliAction } from './args'
import type { CliConfig } from './config'
import type { CollectionStore } from './store'

export interface CommandContext {
  store: CollectionStore
  config: CliConfig
  write: (text: string) => void
  now?: () => number
  random?: () => number
  readTextFile?: (filePath: string) => string
}

export interface ImportTextInput {
  id: string
  title: string
  kind: string
  rawText: string
}

export type OneShotAction = Exclude<CliAction, { command: 'interactive' }>

/**
 * Fetch, record and persist the next line. Without an explicit collection the
 * active one is used, and the first collection is activated if none was.
 */
export function fetchLine(context: CommandContext, mode: SelectionMode, collectionId?: string): string {
  const { store, config, now = Date.now, random = Math.random } = context
  const document = store.load()

  const targetId = collectionId ?? resolveActiveCollectionId(document)
  if (targetId === null) {
    throw new CollectionNotFoundError(null)
  }
  const base = collectionId === undefined && document.activeCollectionId === null
    ? setActiveCollection(document, targetId)
    : document

  const result = selectNext(base, targetId, mode, { now: now(), random, historyLimit: config.historyLimit })
  store.save(result.document)
  return result.line
}

export function importText(context: CommandContext, { id, title, kind, rawText }: ImportTextInput): Collection {
  const document = importCollection(context.store.load(), {
    id,
    title,
    kind: parseCollectionKind(kind),
    rawText,
  })
  context.store.save(document)
  return document.collections[id]
}

export function useCollection(context: CommandContext, collectionId: string): Collection {
  const document = setActiveCollection(context.store.load(), collectionId)
  context.store.save(document)
  return document.collections[collectionId]
}

function readTextFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8')
  } catch (err) {
    throw new ImportFileError(filePath, err)
  }
}

export function runAction(action: OneShotAction, context: CommandContext): void {
  const { store, config, write } = context

  switch (action.command) {
    case 'next':
      write(fetchLine(context, action.mode, action.collectionId))
      return
    case 'collections':
      write(formatCollectionList(listCollections(store.load())))
      return
    case 'history': {
      const document = store.load()
      write(formatHistory(recentHistory(document, action.limit ?? config.historyDisplayCount), document))
      return
    }
    case 'progress':
      write(formatProgress(activeProgress(store.load())))
      return
    case 'use': {
      const collection = useCollection(context, action.collectionId)
      write(`Active collection: ${collection.title} [${collection.id}]`)
      return
    }
    case 'import': {
      const rawText = (context.readTextFile ?? readTextFile)(action.filePath)
      const collection = importText(context, { ...action, rawText })
      write(`Added collection '${collection.title}' with ${collection.lines.length} lines!`)
      return
    }
    case 'help':
      write(HELP_TEXT)
      return
    case 'version':
      write(`${CLI_NAME} ${CLI_VERSION}`)
      return
  }
}

export function exitCodeForError(err: unknown): ExitCode {
  if (err instanceof UsageError) return EXIT_CODE.INVALID_ARGS
  if (err instanceof StorageError) return EXIT_CODE.STORAGE_ERROR
  return EXIT_CODE.OPERATION_ERROR
}
