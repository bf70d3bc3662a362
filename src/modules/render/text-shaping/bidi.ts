import bidiFactory from 'bidi-js';
import { TextDirection } from './text-shaping.strategy';

const bidi = bidiFactory();

/**
 * Visual (left-to-right display) order of a logical string, with bracket
 * mirroring applied to right-to-left runs.
 */
export function toVisualOrder(text: string, direction: TextDirection): string {
  if (text.length === 0) return text;
  const levels = bidi.getEmbeddingLevels(text, direction);
  return bidi.getReorderedString(text, levels);
}
