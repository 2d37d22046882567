/**
 * ChunkMerger - 按阅读顺序合并块和表格
 *
 * 先按 (page, top, left) 排序，再在 token 预算内贪心合并。
 * 表格的 sectionId 为 -1，可以并入任意分节。
 */

import { getLoggerFor } from 'global-logger-factory';
import { encodePositionTags } from './PositionTag';
import type { Tokenizer } from './Tokenizer';
import { EstimatingTokenizer } from './Tokenizer';
import type { Chunk, MergeItem, Position } from './types';

export const TABLE_SECTION_ID = -1;

export interface ChunkMergerOptions {
  tokenizer?: Tokenizer;
  /** 低于该值时无条件合并 */
  minTokens?: number;
  /** 低于该值时同分节或表格才合并 */
  maxTokens?: number;
}

const DEFAULT_MIN_TOKENS = 32;
const DEFAULT_MAX_TOKENS = 1024;
const NO_SECTION = -2;
const ZERO_POSITION: Position = { page: 0, left: 0, right: 0, top: 0, bottom: 0 };

/**
 * 按阅读顺序稳定排序
 */
export function sortByReadingOrder<T extends Pick<MergeItem, 'positions'>>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => {
    const pa = a.positions[0] ?? ZERO_POSITION;
    const pb = b.positions[0] ?? ZERO_POSITION;
    return pa.page - pb.page || pa.top - pb.top || pa.left - pb.left;
  });
}

/**
 * 所有非表格条目的 sectionId 都为 0，说明没有分节信息（如视觉模型输出）
 */
export function hasNoSectioning(items: readonly MergeItem[]): boolean {
  const blocks = items.filter((item) => item.sectionId !== TABLE_SECTION_ID);
  return blocks.length > 0 && blocks.every((item) => item.sectionId === 0);
}

export class ChunkMerger {
  protected readonly logger = getLoggerFor(this);

  private readonly tokenizer: Tokenizer;
  private readonly minTokens: number;
  private readonly maxTokens: number;

  public constructor(options: ChunkMergerOptions = {}) {
    this.tokenizer = options.tokenizer ?? new EstimatingTokenizer();
    this.minTokens = options.minTokens ?? DEFAULT_MIN_TOKENS;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  /**
   * 合并条目，返回带位置标记的块文本
   */
  public merge(items: readonly MergeItem[]): string[] {
    return this.mergeChunks(items).map((chunk) => chunk.text);
  }

  public mergeChunks(items: readonly MergeItem[]): Chunk[] {
    const sorted = sortByReadingOrder(items);
    const mergeEnabled = !hasNoSectioning(items);
    if (!mergeEnabled) {
      this.logger.debug(`No section information in ${items.length} items, keeping them separate`);
    }

    const chunks: Chunk[] = [];
    let lastSectionId = NO_SECTION;

    for (const item of sorted) {
      const text = item.text + encodePositionTags(item.positions);
      const tokens = this.tokenizer.count(item.text);
      const current = chunks.at(-1);

      if (mergeEnabled && current && this.shouldMerge(current.tokenCount, item.sectionId, lastSectionId)) {
        current.text += `\n${text}`;
        current.tokenCount += tokens;
      } else {
        chunks.push({ text, tokenCount: tokens, sectionId: item.sectionId });
      }

      // 合并进上一块的条目同样成为当前节；表格不改变当前节
      if (item.sectionId !== TABLE_SECTION_ID) {
        lastSectionId = item.sectionId;
      }
    }

    this.logger.debug(`Merged ${items.length} items into ${chunks.length} chunks`);
    return chunks;
  }

  private shouldMerge(tokenCount: number, sectionId: number, lastSectionId: number): boolean {
    if (tokenCount < this.minTokens) {
      return true;
    }
    return tokenCount < this.maxTokens && (sectionId === lastSectionId || sectionId === TABLE_SECTION_ID);
  }
}
