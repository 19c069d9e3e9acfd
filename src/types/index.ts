// Kind: what a collection holds. All kinds share storage and selection behavior.
export type CollectionKind = 'affirmations' | 'song_lyrics' | 'poem';

export const COLLECTION_KINDS: readonly CollectionKind[] = ['affirmations', 'song_lyrics', 'poem'];

// Selection mode: how the next line is picked
export type SelectionMode = 'sequential' | 'random';

export interface Collection {
  id: string;
  title: string;
  kind: CollectionKind;
  lines: string[];
  description?: string;
}

export interface Progress {
  cursor: number;     // index of the next line in sequential mode
  cycleCount: number; // completed passes through the collection
}

export interface HistoryEntry {
  collectionId: string;
  line: string;
  lineIndex: number;
  timestamp: number;  // epoch ms
  mode: SelectionMode;
}

export const STORAGE_DOCUMENT_VERSION = 1;

export interface StorageDocument {
  version: typeof STORAGE_DOCUMENT_VERSION;
  collections: Record<string, Collection>;
  progress: Record<string, Progress>;
  activeCollectionId: string | null;
  history: HistoryEntry[];
}

export interface CollectionSummary {
  id: string;
  title: string;
  kind: CollectionKind;
  description?: string;
  lineCount: number;
  cursor: number;
  cycleCount: number;
  isActive: boolean;
}

export interface ProgressReport {
  collectionId: string;
  title: string;
  cursor: number;
  total: number;
  cycleCount: number;
  nextLine: string | null;
}
