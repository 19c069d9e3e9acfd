import type { HistoryEntry, SelectionMode, StorageDocument } from '../types';
import { findCollection } from './activeCollection';
import { findProgress } from './document';
import { CollectionNotFoundError, EmptyCollectionError } from './errors';

export const DEFAULT_HISTORY_LIMIT = 100;

export interface SelectOptions {
  now?: number;
  random?: () => number;
  historyLimit?: number;
}

export interface SelectResult {
  line: string;
  lineIndex: number;
  document: StorageDocument;
}

/**
 * Append to the history log, dropping the oldest entries beyond `limit`.
 */
export function appendHistory(history: HistoryEntry[], entry: HistoryEntry, limit: number): HistoryEntry[] {
  const next = [...history, entry];
  const overflow = next.length - Math.max(0, limit);
  return overflow > 0 ? next.slice(overflow) : next;
}

function randomIndex(length: number, random: () => number): number {
  const index = Math.floor(random() * length);
  return Math.min(length - 1, Math.max(0, index));
}

/**
 * Pick the next line of a collection.
 *
 * Sequential mode returns the line under the cursor and advances it, wrapping
 * to 0 and counting a cycle at the end. Random mode leaves progress alone.
 * Both record a history entry. The input document is not mutated.
 */
export function selectNext(
  document: StorageDocument,
  collectionId: string,
  mode: SelectionMode,
  { now = Date.now(), random = Math.random, historyLimit = DEFAULT_HISTORY_LIMIT }: SelectOptions = {}
): SelectResult {
  const collection = findCollection(document, collectionId);
  if (!collection) {
    throw new CollectionNotFoundError(collectionId);
  }
  const { lines } = collection;
  if (lines.length === 0) {
    throw new EmptyCollectionError(collectionId);
  }

  let progress = findProgress(document, collectionId);
  let lineIndex: number;

  if (mode === 'sequential') {
    // A cursor left past the end (lines shrank on disk) counts as a finished cycle.
    if (progress.cursor >= lines.length) {
      progress = { cursor: 0, cycleCount: progress.cycleCount + 1 };
    }
    lineIndex = progress.cursor;
    const advanced = lineIndex + 1;
    progress = advanced >= lines.length
      ? { cursor: 0, cycleCount: progress.cycleCount + 1 }
      : { cursor: advanced, cycleCount: progress.cycleCount };
  } else {
    lineIndex = randomIndex(lines.length, random);
  }

  const line = lines[lineIndex];
  const entry: HistoryEntry = { collectionId, line, lineIndex, timestamp: now, mode };

  return {
    line,
    lineIndex,
    document: {
      ...document,
      progress: mode === 'sequential'
        ? { ...document.progress, [collectionId]: progress }
        : document.progress,
      history: appendHistory(document.history, entry, historyLimit),
    },
  };
}
