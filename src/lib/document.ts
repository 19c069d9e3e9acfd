import type { Collection, CollectionKind, HistoryEntry, Progress, SelectionMode, StorageDocument } from '../types';
import { COLLECTION_KINDS, STORAGE_DOCUMENT_VERSION } from '../types';
import { createDefaultCollection } from './defaultCollection';
import { StorageError } from './errors';

const COLLECTION_KIND_SET: ReadonlySet<string> = new Set<CollectionKind>(COLLECTION_KINDS);
const SELECTION_MODES: ReadonlySet<string> = new Set<SelectionMode>(['sequential', 'random']);

export function createEmptyProgress(): Progress {
  return { cursor: 0, cycleCount: 0 };
}

/**
 * Recorded progress for a collection, or zero progress. Only own keys count,
 * so ids such as "toString" never resolve to `Object.prototype` members.
 */
export function findProgress(document: Pick<StorageDocument, 'progress'>, collectionId: string): Progress {
  return Object.hasOwn(document.progress, collectionId)
    ? document.progress[collectionId]
    : createEmptyProgress();
}

/**
 * Document used when no data file exists yet: the bundled collection,
 * active, at zero progress, with no history.
 */
export function createDefaultDocument(): StorageDocument {
  const collection = createDefaultCollection();
  return {
    version: STORAGE_DOCUMENT_VERSION,
    collections: { [collection.id]: collection },
    progress: { [collection.id]: createEmptyProgress() },
    activeCollectionId: collection.id,
    history: [],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isCollectionKind(value: unknown): value is CollectionKind {
  return typeof value === 'string' && COLLECTION_KIND_SET.has(value);
}

function isSelectionMode(value: unknown): value is SelectionMode {
  return typeof value === 'string' && SELECTION_MODES.has(value);
}

function parseCollection(key: string, value: unknown): Collection {
  if (!isRecord(value)) {
    throw new StorageError(`Invalid collection entry "${key}"`);
  }
  const { id, title, kind, lines, description } = value;
  if (
    typeof id !== 'string' ||
    typeof title !== 'string' ||
    !isCollectionKind(kind) ||
    !Array.isArray(lines) ||
    !lines.every((line): line is string => typeof line === 'string') ||
    (description !== undefined && typeof description !== 'string')
  ) {
    throw new StorageError(`Invalid collection entry "${key}"`);
  }
  if (id !== key) {
    throw new StorageError(`Collection key "${key}" does not match its id "${id}"`);
  }

  return {
    id,
    title,
    kind,
    lines: [...lines],
    ...(description !== undefined ? { description } : {}),
  };
}

function parseProgress(key: string, value: unknown): Progress {
  if (!isRecord(value) || !isCount(value.cursor) || !isCount(value.cycleCount)) {
    throw new StorageError(`Invalid progress entry "${key}"`);
  }
  return { cursor: value.cursor, cycleCount: value.cycleCount };
}

function parseHistoryEntry(value: unknown, index: number): HistoryEntry {
  if (
    !isRecord(value) ||
    typeof value.collectionId !== 'string' ||
    typeof value.line !== 'string' ||
    !isCount(value.lineIndex) ||
    typeof value.timestamp !== 'number' ||
    !Number.isFinite(value.timestamp) ||
    !isSelectionMode(value.mode)
  ) {
    throw new StorageError(`Invalid history entry at position ${index}`);
  }
  return {
    collectionId: value.collectionId,
    line: value.line,
    lineIndex: value.lineIndex,
    timestamp: value.timestamp,
    mode: value.mode,
  };
}

/**
 * Check parsed JSON against the storage document shape and return a fresh,
 * normalized document. Collections without a progress record get zero progress.
 * History entries may reference collections that were since replaced; they are kept.
 */
export function parseStorageDocument(raw: unknown): StorageDocument {
  if (!isRecord(raw)) {
    throw new StorageError('Data file does not contain a storage document');
  }
  if (raw.version !== STORAGE_DOCUMENT_VERSION) {
    throw new StorageError(`Unsupported data file version: ${String(raw.version)}`);
  }
  if (!isRecord(raw.collections) || !isRecord(raw.progress) || !Array.isArray(raw.history)) {
    throw new StorageError('Invalid storage document payload');
  }

  // fromEntries defines own properties, so an id like "__proto__" stays a plain key.
  const collections: Record<string, Collection> = Object.fromEntries(
    Object.entries(raw.collections).map(([key, value]): [string, Collection] => [key, parseCollection(key, value)])
  );

  const recorded = raw.progress;
  const progressEntries = Object.entries(recorded).map(([key, value]): [string, Progress] => {
    if (!Object.hasOwn(collections, key)) {
      throw new StorageError(`Progress recorded for unknown collection "${key}"`);
    }
    return [key, parseProgress(key, value)];
  });
  const backfilled = Object.keys(collections)
    .filter((id) => !Object.hasOwn(recorded, id))
    .map((id): [string, Progress] => [id, createEmptyProgress()]);
  const progress: Record<string, Progress> = Object.fromEntries([...progressEntries, ...backfilled]);

  let activeCollectionId: string | null = null;
  if (raw.activeCollectionId !== undefined && raw.activeCollectionId !== null) {
    if (typeof raw.activeCollectionId !== 'string') {
      throw new StorageError('Invalid active collection id');
    }
    if (!Object.hasOwn(collections, raw.activeCollectionId)) {
      throw new StorageError(`Active collection "${raw.activeCollectionId}" does not exist`);
    }
    activeCollectionId = raw.activeCollectionId;
  }

  return {
    version: STORAGE_DOCUMENT_VERSION,
    collections,
    progress,
    activeCollectionId,
    history: raw.history.map(parseHistoryEntry),
  };
}

export function serializeStorageDocument(document: StorageDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}
