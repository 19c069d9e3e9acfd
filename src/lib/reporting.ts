import type { CollectionSummary, HistoryEntry, ProgressReport, StorageDocument } from '../types';
import { findCollection } from './activeCollection';
import { findProgress } from './document';

export const DEFAULT_HISTORY_DISPLAY_COUNT = 10;

export function listCollections(document: StorageDocument): CollectionSummary[] {
  return Object.values(document.collections).map((collection) => {
    const progress = findProgress(document, collection.id);
    return {
      id: collection.id,
      title: collection.title,
      kind: collection.kind,
      ...(collection.description !== undefined ? { description: collection.description } : {}),
      lineCount: collection.lines.length,
      cursor: progress.cursor,
      cycleCount: progress.cycleCount,
      isActive: collection.id === document.activeCollectionId,
    };
  });
}

/**
 * The last `limit` history entries, most recent first.
 */
export function recentHistory(
  document: StorageDocument,
  limit: number = DEFAULT_HISTORY_DISPLAY_COUNT
): HistoryEntry[] {
  if (limit <= 0) return [];
  return document.history.slice(-limit).reverse();
}

export function activeProgress(document: StorageDocument): ProgressReport | null {
  const { activeCollectionId } = document;
  if (activeCollectionId === null) return null;
  const collection = findCollection(document, activeCollectionId);
  if (!collection) return null;

  const progress = findProgress(document, activeCollectionId);
  const total = collection.lines.length;
  const nextIndex = progress.cursor < total ? progress.cursor : 0;

  return {
    collectionId: activeCollectionId,
    title: collection.title,
    cursor: progress.cursor,
    total,
    cycleCount: progress.cycleCount,
    nextLine: total > 0 ? collection.lines[nextIndex] : null,
  };
}
