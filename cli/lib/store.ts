import * as fs from 'fs'
import * as path from 'path'
import type { StorageDocument } from '../../src/types'
import { createDefaultDocument, parseStorageDocument, serializeStorageDocument } from '../../src/lib/document'
import { StorageError, getErrorMessage } from '../../src/lib/errors'

export interface CollectionStore {
  readonly filePath: string
  load(): StorageDocument
  save(document: StorageDocument): void
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Read the data file. A missing file yields the default document; anything
 * else that is not a storage document is a StorageError.
 */
export function loadDocument(filePath: string): StorageDocument {
  let raw: string
  try {
    raw = fs.readFileSync(filePath, 'utf-8')
  } catch (err) {
    if (isMissingFileError(err)) return createDefaultDocument()
    throw new StorageError(`Failed to read data file ${filePath}: ${getErrorMessage(err, 'unknown error')}`, err)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new StorageError(`Data file ${filePath} is not valid JSON`, err)
  }

  try {
    return parseStorageDocument(parsed)
  } catch (err) {
    throw new StorageError(`Invalid data file ${filePath}: ${getErrorMessage(err, 'unknown error')}`, err)
  }
}

/**
 * Write the whole document, replacing the file in one rename.
 */
export function saveDocument(filePath: string, document: StorageDocument): void {
  const tempPath = `${filePath}.${process.pid}.tmp`
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    fs.writeFileSync(tempPath, serializeStorageDocument(document), 'utf-8')
    fs.renameSync(tempPath, filePath)
  } catch (err) {
    if (fs.existsSync(tempPath)) fs.rmSync(tempPath, { force: true })
    throw new StorageError(`Failed to save data file ${filePath}: ${getErrorMessage(err, 'unknown error')}`, err)
  }
}

export function createFileStore(filePath: string): CollectionStore {
  const resolved = path.resolve(filePath)
  return {
    filePath: resolved,
    load: () => loadDocument(resolved),
    save: (document) => saveDocument(resolved, document),
  }
}
