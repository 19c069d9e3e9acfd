import { describe, expect, it } from 'vitest';
import { createDefaultDocument, findProgress, parseStorageDocument, serializeStorageDocument } from './document';
import { findCollection } from './activeCollection';
import { DEFAULT_COLLECTION_ID, createDefaultCollection } from './defaultCollection';
import { StorageError } from './errors';
import { createTestCollection, createTestDocument, createTestHistoryEntry } from '../test/document-helpers';

describe('document', () => {
  it('creates a default document with only the bundled collection', () => {
    const document = createDefaultDocument();

    expect(Object.keys(document.collections)).toEqual([DEFAULT_COLLECTION_ID]);
    expect(document.collections[DEFAULT_COLLECTION_ID]).toEqual(createDefaultCollection());
    expect(document.progress).toEqual({ [DEFAULT_COLLECTION_ID]: { cursor: 0, cycleCount: 0 } });
    expect(document.activeCollectionId).toBe(DEFAULT_COLLECTION_ID);
    expect(document.history).toEqual([]);
  });

  it('bundles a non-empty song', () => {
    const collection = createDefaultCollection();
    expect(collection.kind).toBe('song_lyrics');
    expect(collection.lines).toHaveLength(8);
  });

  it('hands out independent copies of the bundled lines', () => {
    const first = createDefaultDocument();
    first.collections[DEFAULT_COLLECTION_ID].lines.push('extra');

    expect(createDefaultDocument().collections[DEFAULT_COLLECTION_ID].lines).toHaveLength(8);
  });

  it('parses a serialized document back to an equal document', () => {
    const collection = createTestCollection({ id: 'calm', description: 'Quiet lines' });
    const document = createTestDocument([collection], {
      progress: { calm: { cursor: 2, cycleCount: 3 } },
      history: [createTestHistoryEntry({ collectionId: 'calm', mode: 'random', lineIndex: 1, line: 'second line' })],
    });

    const parsed = parseStorageDocument(JSON.parse(serializeStorageDocument(document)));

    expect(parsed).toEqual(document);
    expect(serializeStorageDocument(parsed)).toBe(serializeStorageDocument(document));
  });

  it('serializes as indented JSON with a trailing newline', () => {
    const text = serializeStorageDocument(createTestDocument([]));
    expect(text).toBe(
      '{\n  "version": 1,\n  "collections": {},\n  "progress": {},\n  "activeCollectionId": null,\n  "history": []\n}\n'
    );
  });

  it('backfills zero progress for collections without a record', () => {
    const collection = createTestCollection({ id: 'fresh' });
    const parsed = parseStorageDocument({
      ...createTestDocument([collection]),
      progress: {},
    });

    expect(parsed.progress).toEqual({ fresh: { cursor: 0, cycleCount: 0 } });
  });

  it('treats a missing active id as none', () => {
    const raw: Record<string, unknown> = { ...createTestDocument([createTestCollection({ id: 'x' })]) };
    delete raw.activeCollectionId;

    expect(parseStorageDocument(raw).activeCollectionId).toBeNull();
  });

  it('rejects values that are not storage documents', () => {
    expect(() => parseStorageDocument(null)).toThrow(StorageError);
    expect(() => parseStorageDocument([])).toThrow('Data file does not contain a storage document');
    expect(() => parseStorageDocument({ version: 2 })).toThrow('Unsupported data file version: 2');
    expect(() => parseStorageDocument({ version: 1, collections: {}, progress: {} })).toThrow(
      'Invalid storage document payload'
    );
  });

  it('rejects malformed collections', () => {
    const document = createTestDocument([]);
    expect(() =>
      parseStorageDocument({
        ...document,
        collections: { bad: { id: 'bad', title: 'Bad', kind: 'haiku', lines: [] } },
      })
    ).toThrow('Invalid collection entry "bad"');
    expect(() =>
      parseStorageDocument({
        ...document,
        collections: { bad: { id: 'bad', title: 'Bad', kind: 'poem', lines: ['ok', 3] } },
      })
    ).toThrow('Invalid collection entry "bad"');
    expect(() =>
      parseStorageDocument({
        ...document,
        collections: { one: { id: 'two', title: 'Mismatch', kind: 'poem', lines: [] } },
      })
    ).toThrow('Collection key "one" does not match its id "two"');
  });

  it('rejects progress and active ids that point at missing collections', () => {
    const document = createTestDocument([createTestCollection({ id: 'kept' })]);

    expect(() =>
      parseStorageDocument({ ...document, progress: { gone: { cursor: 0, cycleCount: 0 } } })
    ).toThrow('Progress recorded for unknown collection "gone"');
    expect(() => parseStorageDocument({ ...document, activeCollectionId: 'gone' })).toThrow(
      'Active collection "gone" does not exist'
    );
    expect(() => parseStorageDocument({ ...document, activeCollectionId: 'toString' })).toThrow(
      'Active collection "toString" does not exist'
    );
  });

  it('keeps a collection with id "__proto__" across parse and serialize', () => {
    const text = serializeStorageDocument(
      createTestDocument([createTestCollection({ id: '__proto__', lines: ['steady'] })])
    );

    const parsed = parseStorageDocument(JSON.parse(text));

    expect(Object.keys(parsed.collections)).toEqual(['__proto__']);
    expect(Object.keys(parsed.progress)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(parsed.collections)).toBe(Object.prototype);
    expect(findCollection(parsed, '__proto__')?.lines).toEqual(['steady']);
    expect(parsed.activeCollectionId).toBe('__proto__');
    expect(serializeStorageDocument(parsed)).toBe(text);
  });

  it('backfills progress for ids that shadow Object.prototype members', () => {
    const parsed = parseStorageDocument({
      ...createTestDocument([
        createTestCollection({ id: 'toString' }),
        createTestCollection({ id: 'constructor' }),
      ]),
      progress: {},
    });

    expect(Object.keys(parsed.progress)).toEqual(['toString', 'constructor']);
    expect(Object.hasOwn(parsed.progress, 'toString')).toBe(true);
    expect(findProgress(parsed, 'toString')).toEqual({ cursor: 0, cycleCount: 0 });
    expect(findProgress(parsed, 'constructor')).toEqual({ cursor: 0, cycleCount: 0 });
  });

  it('keeps recorded progress order and appends backfilled entries', () => {
    const parsed = parseStorageDocument({
      ...createTestDocument([createTestCollection({ id: 'a' }), createTestCollection({ id: 'b' })]),
      progress: { b: { cursor: 1, cycleCount: 0 } },
    });

    expect(Object.keys(parsed.progress)).toEqual(['b', 'a']);
  });

  it('finds only own progress records', () => {
    const document = createTestDocument([createTestCollection({ id: 'valueOf' })], { progress: {} });

    expect(findProgress(document, 'valueOf')).toEqual({ cursor: 0, cycleCount: 0 });
    expect(findProgress(document, 'hasOwnProperty')).toEqual({ cursor: 0, cycleCount: 0 });
  });

  it('rejects negative or fractional progress', () => {
    const document = createTestDocument([createTestCollection({ id: 'kept' })]);

    expect(() =>
      parseStorageDocument({ ...document, progress: { kept: { cursor: -1, cycleCount: 0 } } })
    ).toThrow('Invalid progress entry "kept"');
    expect(() =>
      parseStorageDocument({ ...document, progress: { kept: { cursor: 0, cycleCount: 1.5 } } })
    ).toThrow('Invalid progress entry "kept"');
  });

  it('rejects malformed history entries with their position', () => {
    const document = createTestDocument([createTestCollection({ id: 'test-1' })]);

    expect(() =>
      parseStorageDocument({
        ...document,
        history: [createTestHistoryEntry(), { ...createTestHistoryEntry(), mode: 'shuffle' }],
      })
    ).toThrow('Invalid history entry at position 1');
  });
});
