import type { Position } from './types';

const TAG_PATTERN = /@@(-?[0-9]+)\t(-?[0-9.]+)\t(-?[0-9.]+)\t(-?[0-9.]+)\t(-?[0-9.]+)##/g;

/**
 * Encodes one geometry fragment as an inline tag.
 * Returns an empty string for the all-zero "no position" fragment.
 */
export function encodePositionTag(position: Position): string {
  const { page, left, right, top, bottom } = position;
  if (page === 0 && left === 0 && right === 0 && top === 0 && bottom === 0) {
    return '';
  }
  return `@@${page}\t${left.toFixed(1)}\t${right.toFixed(1)}\t${top.toFixed(1)}\t${bottom.toFixed(1)}##`;
}

/**
 * Tags for every fragment of an item, tab separated.
 */
export function encodePositionTags(positions: readonly Position[]): string {
  return positions.map(encodePositionTag).join('\t');
}

export interface ParsedPositionTags {
  /** Text with all tags removed */
  text: string;
  positions: Position[];
}

/**
 * Pulls the tags back out of a chunk text.
 */
export function parsePositionTags(tagged: string): ParsedPositionTags {
  const positions: Position[] = [];
  for (const match of tagged.matchAll(TAG_PATTERN)) {
    positions.push({
      page: Number(match[1]),
      left: Number(match[2]),
      right: Number(match[3]),
      top: Number(match[4]),
      bottom: Number(match[5]),
    });
  }
  const text = tagged.replace(TAG_PATTERN, '').replace(/\t+$/gm, '');
  return { text, positions };
}
