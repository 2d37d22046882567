/**
 * 文档结构重建的公共数据类型
 */

/**
 * 单个几何片段: (page, left, right, top, bottom)
 * 全部为 0 表示没有位置信息
 */
export interface Position {
  page: number;
  left: number;
  right: number;
  top: number;
  bottom: number;
}

/**
 * 版面引擎输出的文本块
 */
export interface Block {
  readonly text: string;
  /** 版面标签，如 "title"、"text"、"header" */
  readonly layoutLabel: string;
  /** 一个块可以跨多个片段（多行） */
  readonly positions: readonly Position[];
}

/**
 * 版面引擎提供的目录项
 */
export interface OutlineEntry {
  text: string;
  level: number;
}

/**
 * 版面引擎抽取出的表格，页码为 0 起始的绝对页码
 */
export interface ExtractedTable {
  /** 自包含的表格标记（HTML），为空表示没有内容 */
  markup: string;
  positions: Position[];
}

/**
 * 参与合并的条目，表格的 sectionId 固定为 -1
 */
export interface MergeItem {
  text: string;
  sectionId: number;
  positions: readonly Position[];
}

/**
 * 合并过程中的累加块
 */
export interface Chunk {
  text: string;
  tokenCount: number;
  sectionId: number;
}

/**
 * 嵌入文档的图片
 */
export interface DocumentImage {
  data: Buffer;
  mimeType: string;
}

/**
 * 层级问答单元
 */
export interface QaUnit {
  /** 从根到叶的标题路径 */
  headingPath: string[];
  answerText: string;
  answerImage?: DocumentImage;
}

export type ChunkRecordKind = 'text' | 'table' | 'image';

/**
 * 可索引的输出记录
 */
export interface ChunkRecord {
  docName: string;
  title: string;
  language: string;
  kind: ChunkRecordKind;
  content: string;
  /** 表格记录的位置信息，不内联到 content 中 */
  positions?: Position[];
  image?: DocumentImage;
}

/**
 * 待解析的文档，filePath 与 buffer 二选一
 */
export interface DocumentSource {
  name: string;
  filePath?: string;
  buffer?: Buffer;
}

/**
 * 页码区间 [from, to)
 */
export interface PageRange {
  from: number;
  to: number;
}

/**
 * 进度回调，progress 为 0..1，缺省表示只有消息
 */
export type ProgressCallback = (progress: number | undefined, message: string) => void;
