/**
 * Document module - 文档结构重建和分块
 */

// 类型和错误
export * from './types';
export * from './errors';
export * from './ParserConfig';

// 结构重建
export * from './PositionTag';
export * from './BulletPatterns';
export * from './HeadingClassifier';
export * from './SectionAssigner';
export * from './Tokenizer';
export * from './ChunkMerger';
export * from './TableNormalizer';
export * from './QaReconstructor';

// 协作者
export * from './ImageComposer';
export * from './ImageDescriber';
export * from './layout/LayoutEngine';
export * from './layout/PlainTextLayoutEngine';
export * from './docx/DocxReader';

// 入口
export * from './ManualParser';
