import type { Collection, CollectionKind, StorageDocument } from '../types';
import { COLLECTION_KINDS } from '../types';
import { createEmptyProgress } from './document';
import { EmptyInputError, InvalidIdError, InvalidKindError } from './errors';

export interface ImportCollectionInput {
  id: string;
  title: string;
  kind: CollectionKind;
  rawText: string;
  description?: string;
}

const HEADING = /^#/;
const HORIZONTAL_RULE = /^([-*_])(\s*\1){2,}$/;
// "- ", "* ", "+ ", "1. ", "12) ", optionally followed by a task box "[ ]" / "[x]"
const LIST_MARKER = /^(?:[-*+]|\d{1,9}[.)])(?:\s+|$)(?:\[[ xX]\](?:\s+|$))?/;

/**
 * Split pasted markdown into display lines. Blank lines, lines starting with
 * "#" and horizontal rules are dropped; list markup and surrounding whitespace are stripped.
 */
export function parseMarkdownLines(rawText: string): string[] {
  const lines: string[] = [];
  for (const rawLine of rawText.split(/\r?\n/)) {
    const trimmed = rawLine.trim();
    if (!trimmed || HEADING.test(trimmed) || HORIZONTAL_RULE.test(trimmed)) continue;
    const text = trimmed.replace(LIST_MARKER, '').trim();
    if (text) lines.push(text);
  }
  return lines;
}

export function validateCollectionId(id: string): void {
  if (id.length === 0 || /\s/.test(id)) {
    throw new InvalidIdError(id);
  }
}

/**
 * Turn free-form input into an id: trimmed, with whitespace runs replaced by "_".
 */
export function normalizeCollectionId(value: string): string {
  return value.trim().replace(/\s+/g, '_');
}

export function parseCollectionKind(value: string): CollectionKind {
  const normalized = value.trim().toLowerCase().replace(/-/g, '_');
  if (!normalized) return 'affirmations';
  const kind = COLLECTION_KINDS.find((candidate) => candidate === normalized);
  if (!kind) {
    throw new InvalidKindError(value.trim());
  }
  return kind;
}

/**
 * Register parsed text as a collection, replacing any collection with the same
 * id and resetting its progress. The active collection only changes when none
 * was set.
 */
export function importCollection(
  document: StorageDocument,
  { id, title, kind, rawText, description }: ImportCollectionInput
): StorageDocument {
  validateCollectionId(id);
  const lines = parseMarkdownLines(rawText);
  if (lines.length === 0) {
    throw new EmptyInputError();
  }

  const collection: Collection = {
    id,
    title: title.trim() || id,
    kind,
    lines,
    description: description ?? `Added via markdown - ${kind}`,
  };

  return {
    ...document,
    collections: { ...document.collections, [id]: collection },
    progress: { ...document.progress, [id]: createEmptyProgress() },
    activeCollectionId: document.activeCollectionId ?? id,
  };
}
