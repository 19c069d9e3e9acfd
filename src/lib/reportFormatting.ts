import type { CollectionSummary, HistoryEntry, ProgressReport, StorageDocument } from '../types';

const PREVIEW_LENGTH = 50;

export function truncateLine(text: string, maxLength: number = PREVIEW_LENGTH): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

export function formatCollectionList(summaries: CollectionSummary[]): string {
  if (summaries.length === 0) return 'No collections yet.';

  const lines = ['=== Available Collections ==='];
  for (const summary of summaries) {
    const active = summary.isActive ? ' (active)' : '';
    lines.push(
      `• ${summary.title} [${summary.id}] (${summary.kind}) - ${summary.lineCount} lines, ` +
        `progress ${summary.cursor}/${summary.lineCount}${active}`
    );
    if (summary.description) {
      lines.push(`  ${summary.description}`);
    }
  }
  return lines.join('\n');
}

/**
 * Numbered history listing, most recent first. Entries show the title of the
 * collection they came from, or its id if it no longer exists.
 */
export function formatHistory(entries: HistoryEntry[], document: StorageDocument): string {
  if (entries.length === 0) return 'No affirmations shown yet.';

  const lines = [`=== Last ${entries.length} Affirmations ===`];
  entries.forEach((entry, index) => {
    const title = Object.hasOwn(document.collections, entry.collectionId)
      ? document.collections[entry.collectionId].title
      : entry.collectionId;
    lines.push(`${index + 1}. [${title}] ${entry.line}`);
  });
  return lines.join('\n');
}

export function formatProgress(report: ProgressReport | null): string {
  if (!report) return 'No current collection selected.';

  return [
    '=== Current Progress ===',
    `Collection: ${report.title}`,
    `Progress: ${report.cursor}/${report.total} lines`,
    `Cycles completed: ${report.cycleCount}`,
    report.nextLine === null ? 'Collection is empty.' : `Next line: "${truncateLine(report.nextLine)}"`,
  ].join('\n');
}
