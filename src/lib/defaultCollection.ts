import type { Collection } from '../types';

export const DEFAULT_COLLECTION_ID = 'keep_on_rising';

const DEFAULT_LINES: readonly string[] = [
  'Every morning the sun finds the road I left behind',
  'I fall down seven times and I rise up number eight',
  'The river never asks the stone for permission to move',
  'Hold your head up high, the storm is only passing by',
  'What is meant for me will know my name and find my door',
  'I keep on walking, the mountain is smaller than my will',
  'They built the walls so high but they forgot the sky',
  'Tomorrow is a page that I will write in my own hand',
];

/**
 * Lyrics bundled with the program. Seeds the data file on first run.
 */
export function createDefaultCollection(): Collection {
  return {
    id: DEFAULT_COLLECTION_ID,
    title: 'Keep On Rising',
    kind: 'song_lyrics',
    lines: [...DEFAULT_LINES],
    description: 'Bundled lyrics about getting back up and carrying on',
  };
}
