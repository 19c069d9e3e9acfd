import type { Collection, StorageDocument } from '../types';
import { CollectionNotFoundError } from './errors';

export function findCollection(document: StorageDocument, collectionId: string): Collection | null {
  return Object.hasOwn(document.collections, collectionId) ? document.collections[collectionId] : null;
}

/**
 * The active collection id, or the first collection when none is set yet.
 */
export function resolveActiveCollectionId(document: StorageDocument): string | null {
  if (document.activeCollectionId !== null) return document.activeCollectionId;
  return Object.keys(document.collections)[0] ?? null;
}

export function setActiveCollection(document: StorageDocument, collectionId: string): StorageDocument {
  if (!findCollection(document, collectionId)) {
    throw new CollectionNotFoundError(collectionId);
  }
  if (document.activeCollectionId === collectionId) return document;
  return { ...document, activeCollectionId: collectionId };
}
