import { beforeEach, describe, expect, it } from 'vitest';
import { findCollection, resolveActiveCollectionId, setActiveCollection } from './activeCollection';
import { CollectionNotFoundError } from './errors';
import { createTestCollection, createTestDocument, resetIdCounter } from '../test/document-helpers';

beforeEach(() => {
  resetIdCounter();
});

describe('activeCollection', () => {
  const document = createTestDocument(
    [createTestCollection({ id: 'first' }), createTestCollection({ id: 'second' })],
    { activeCollectionId: null }
  );

  it('finds own collections only', () => {
    expect(findCollection(document, 'second')?.id).toBe('second');
    expect(findCollection(document, 'missing')).toBeNull();
    expect(findCollection(document, 'constructor')).toBeNull();
  });

  it('falls back to the first collection when none is active', () => {
    expect(resolveActiveCollectionId(document)).toBe('first');
    expect(resolveActiveCollectionId({ ...document, activeCollectionId: 'second' })).toBe('second');
    expect(resolveActiveCollectionId(createTestDocument([]))).toBeNull();
  });

  it('switches the active collection', () => {
    const next = setActiveCollection(document, 'second');
    expect(next.activeCollectionId).toBe('second');
    expect(document.activeCollectionId).toBeNull();
    expect(setActiveCollection(next, 'second')).toBe(next);
  });

  it('refuses unknown collections', () => {
    expect(() => setActiveCollection(document, 'missing')).toThrow(CollectionNotFoundError);
  });
});
