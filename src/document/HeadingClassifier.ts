/**
 * HeadingClassifier - 推断每个块的标题层级
 *
 * 两种策略：目录足够密集时按目录文本匹配，否则按编号样式的出现频率推断。
 * 策略在每个文档上只选择一次。
 */

import {
  BULLET_CATEGORIES,
  detectBulletCategory,
  isNotBullet,
  isNotTitle,
  matchBulletLevel,
} from './BulletPatterns';
import { StructuralInvariantError } from './errors';
import type { Block, OutlineEntry } from './types';

export type HeadingStrategy =
  | { kind: 'outline'; outline: readonly OutlineEntry[] }
  | { kind: 'bullet'; categoryIndex: number };

export interface HeadingLevels {
  /** 每个块一个层级，数值越小层级越高 */
  levels: number[];
  /** 作为分节边界的层级 */
  pivotLevel: number;
  strategy: HeadingStrategy['kind'];
}

export interface HeadingClassifierOptions {
  /** 目录条数 / 块数 超过该值才信任目录 */
  outlineDensity?: number;
  /** 目录文本与块文本的二元组相似度阈值 */
  similarityThreshold?: number;
}

const DEFAULT_OUTLINE_DENSITY = 0.03;
const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

/**
 * 选择策略
 */
export function selectHeadingStrategy(
  blocks: readonly Block[],
  outline: readonly OutlineEntry[] | undefined,
  outlineDensity = DEFAULT_OUTLINE_DENSITY,
): HeadingStrategy {
  if (outline && outline.length > 0 && blocks.length > 0 && outline.length / blocks.length > outlineDensity) {
    return { kind: 'outline', outline };
  }
  return { kind: 'bullet', categoryIndex: detectBulletCategory(blocks.map((block) => block.text)) };
}

/**
 * 计算每个块的标题层级和分节基准层级
 */
export function classifyHeadings(
  blocks: readonly Block[],
  outline?: readonly OutlineEntry[],
  options: HeadingClassifierOptions = {},
): HeadingLevels {
  const strategy = selectHeadingStrategy(blocks, outline, options.outlineDensity);
  const result = strategy.kind === 'outline' ?
    levelsFromOutline(blocks, strategy.outline, options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD) :
    levelsFromBullets(blocks, strategy.categoryIndex);

  if (result.levels.length !== blocks.length) {
    throw new StructuralInvariantError(
      `Heading level count ${result.levels.length} does not match block count ${blocks.length}`,
    );
  }
  return { ...result, strategy: strategy.kind };
}

function levelsFromOutline(
  blocks: readonly Block[],
  outline: readonly OutlineEntry[],
  threshold: number,
): Omit<HeadingLevels, 'strategy'> {
  const maxLevel = Math.max(...outline.map((entry) => entry.level));
  const outlineBigrams = outline.map((entry) => bigrams(Array.from(entry.text), Array.from(entry.text).length - 1));

  const levels = blocks.map((block) => {
    const chars = Array.from(block.text);
    for (let i = 0; i < outline.length; i++) {
      const entryBigrams = outlineBigrams[i];
      const blockBigrams = bigrams(chars, Math.min(Array.from(outline[i].text).length, chars.length - 1));
      if (overlap(entryBigrams, blockBigrams) > threshold) {
        return outline[i].level;
      }
    }
    return maxLevel + 1;
  });

  return { levels, pivotLevel: Math.max(0, maxLevel - 1) };
}

function levelsFromBullets(blocks: readonly Block[], categoryIndex: number): Omit<HeadingLevels, 'strategy'> {
  if (categoryIndex < 0) {
    // 没有可用的编号样式：单一层级，不分节
    return { levels: blocks.map(() => 0), pivotLevel: 0 };
  }

  const category = BULLET_CATEGORIES[categoryIndex];
  const size = category.patterns.length;
  const levels = blocks.map((block) => {
    const level = matchBulletLevel(category, block.text.trim());
    if (level >= 0 && !isNotBullet(block.text)) {
      return level;
    }
    if (/(title|head)/.test(block.layoutLabel) && !isNotTitle(block.text.split('@')[0])) {
      return size;
    }
    return size + 1;
  });

  return { levels, pivotLevel: mostFrequentHeadingLevel(levels, size) };
}

/**
 * 出现次数最多且不超过 maxLevel 的层级，次数相同取先出现的
 */
function mostFrequentHeadingLevel(levels: readonly number[], maxLevel: number): number {
  const counts = new Map<number, number>();
  for (const level of levels) {
    counts.set(level, (counts.get(level) ?? 0) + 1);
  }
  let best = maxLevel + 1;
  let bestCount = 0;
  for (const [level, count] of counts) {
    if (level <= maxLevel && count > bestCount) {
      best = level;
      bestCount = count;
    }
  }
  return best;
}

function bigrams(chars: readonly string[], count: number): Set<string> {
  const result = new Set<string>();
  for (let i = 0; i < count; i++) {
    result.add(chars[i] + chars[i + 1]);
  }
  return result;
}

function overlap(a: Set<string>, b: Set<string>): number {
  let shared = 0;
  for (const gram of a) {
    if (b.has(gram)) {
      shared++;
    }
  }
  return shared / Math.max(a.size, b.size, 1);
}
