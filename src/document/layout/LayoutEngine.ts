/**
 * LayoutEngine - 版面/OCR 引擎接口
 *
 * 把页面转换为带位置的文本块、表格和可选目录。
 * 确定性引擎和视觉模型引擎由宿主注入。
 */

import type { Block, ExtractedTable, OutlineEntry, PageRange, ProgressCallback } from '../types';

export interface LayoutExtraction {
  blocks: Block[];
  /** 表格位置中的页码为 0 起始的绝对页码 */
  tables: ExtractedTable[];
  /** 引擎不支持目录时省略 */
  outline?: OutlineEntry[];
}

export interface LayoutEngine {
  extract(input: string | Buffer, range: PageRange, progress: ProgressCallback): Promise<LayoutExtraction>;
}

/**
 * 根据模型名创建视觉版面引擎，模型不可用时抛出
 */
export type VisionLayoutEngineFactory = (modelName: string) => LayoutEngine;
