/**
 * ManualParser - 手册类文档的解析入口
 *
 * PDF: 版面抽取 → 标题层级 → 分节 → 按 token 预算合并
 * DOCX: 段落流 → 层级问答单元
 */

import { readFile } from 'node:fs/promises';
import { getLoggerFor } from 'global-logger-factory';
import { ChunkMerger, TABLE_SECTION_ID } from './ChunkMerger';
import type { ChunkMergerOptions } from './ChunkMerger';
import { DocxReader } from './docx/DocxReader';
import {
  InvalidSourceError,
  LayoutEngineUnavailableError,
  UnsupportedFormatError,
} from './errors';
import { classifyHeadings } from './HeadingClassifier';
import type { HeadingClassifierOptions } from './HeadingClassifier';
import type { ImageComposer } from './ImageComposer';
import { SharpImageComposer } from './ImageComposer';
import type { ImageDescriber, ImageDescriberFactory } from './ImageDescriber';
import type { LayoutEngine, LayoutExtraction, VisionLayoutEngineFactory } from './layout/LayoutEngine';
import { PlainTextLayoutEngine } from './layout/PlainTextLayoutEngine';
import type { ParserConfig, ParserConfigBundle } from './ParserConfig';
import { DEEPDOC_RECOGNIZER, isVisionRecognizer, normalizeParserConfig, PLAIN_TEXT_RECOGNIZER } from './ParserConfig';
import { QaReconstructor } from './QaReconstructor';
import { assignSectionIds } from './SectionAssigner';
import { normalizeTable } from './TableNormalizer';
import type {
  Block,
  ChunkRecord,
  DocumentSource,
  MergeItem,
  PageRange,
  Position,
  ProgressCallback,
} from './types';

export type DocumentFormat = 'pdf' | 'docx';

export interface ManualParserOptions {
  /** 确定性版面引擎（DeepDOC） */
  layoutEngine?: LayoutEngine;
  /** 纯文本引擎，默认 PlainTextLayoutEngine */
  plainTextEngine?: LayoutEngine;
  visionLayoutEngineFactory?: VisionLayoutEngineFactory;
  imageDescriberFactory?: ImageDescriberFactory;
  imageComposer?: ImageComposer;
  docxReader?: DocxReader;
  merger?: ChunkMergerOptions;
  classifier?: HeadingClassifierOptions;
}

export interface ParseOptions {
  range?: Partial<PageRange>;
  /** 语言提示，只影响下游分词 */
  language?: string;
  config?: ParserConfigBundle;
  progress?: ProgressCallback;
}

export const DEFAULT_PAGE_RANGE: Readonly<PageRange> = { from: 0, to: 100000 };
export const DEFAULT_LANGUAGE = 'Chinese';

/**
 * 根据文件名判断格式，不支持时抛出 UnsupportedFormatError
 */
export function detectFormat(fileName: string): DocumentFormat {
  if (/\.pdf$/i.test(fileName)) {
    return 'pdf';
  }
  if (/\.docx?$/i.test(fileName)) {
    return 'docx';
  }
  throw new UnsupportedFormatError(fileName);
}

/**
 * 去掉扩展名作为标题
 */
export function documentTitle(fileName: string): string {
  return fileName.replace(/\.[a-zA-Z]+$/, '');
}

/**
 * 合并连续的空白（含全角空格）为一个空格
 */
export function cleanBlockText(text: string): string {
  return text.trim().replace(/[\t \u3000]{2,}/g, ' ');
}

/**
 * 表格页码从 0 起始的绝对页码转换为相对于起始页的 1 起始页码
 */
export function shiftTablePositions(positions: readonly Position[], from: number): Position[] {
  return positions.map((position) => ({ ...position, page: position.page + 1 - from }));
}

export class ManualParser {
  protected readonly logger = getLoggerFor(this);

  private readonly layoutEngine?: LayoutEngine;
  private readonly plainTextEngine: LayoutEngine;
  private readonly visionLayoutEngineFactory?: VisionLayoutEngineFactory;
  private readonly imageDescriberFactory?: ImageDescriberFactory;
  private readonly imageComposer: ImageComposer;
  private readonly docxReader: DocxReader;
  private readonly merger: ChunkMerger;
  private readonly classifierOptions: HeadingClassifierOptions;

  public constructor(options: ManualParserOptions = {}) {
    this.layoutEngine = options.layoutEngine;
    this.plainTextEngine = options.plainTextEngine ?? new PlainTextLayoutEngine();
    this.visionLayoutEngineFactory = options.visionLayoutEngineFactory;
    this.imageDescriberFactory = options.imageDescriberFactory;
    this.imageComposer = options.imageComposer ?? new SharpImageComposer();
    this.docxReader = options.docxReader ?? new DocxReader();
    this.merger = new ChunkMerger(options.merger);
    this.classifierOptions = options.classifier ?? {};
  }

  public async parse(source: DocumentSource, options: ParseOptions = {}): Promise<ChunkRecord[]> {
    const format = detectFormat(source.name);
    const input = this.resolveInput(source);
    const config = normalizeParserConfig(options.config);
    const range: PageRange = { ...DEFAULT_PAGE_RANGE, ...options.range };
    const progress: ProgressCallback = options.progress ?? ((): void => undefined);
    const base = {
      docName: source.name,
      title: documentTitle(source.name),
      language: options.language ?? DEFAULT_LANGUAGE,
    };

    this.logger.info(`Parsing ${source.name} as ${format} with ${config.layoutRecognize}, pages [${range.from}, ${range.to})`);
    const records = format === 'pdf' ?
      await this.parsePdf(input, range, config, progress, base) :
      await this.parseDocx(input, range, config, progress, base);
    this.logger.info(`Parsed ${source.name}: ${records.length} records`);
    return records;
  }

  private resolveInput(source: DocumentSource): string | Buffer {
    if (source.buffer) {
      return source.buffer;
    }
    if (source.filePath) {
      return source.filePath;
    }
    throw new InvalidSourceError(`Document ${source.name} has neither a file path nor content`);
  }

  private async parsePdf(
    input: string | Buffer,
    range: PageRange,
    config: ParserConfig,
    progress: ProgressCallback,
    base: Pick<ChunkRecord, 'docName' | 'title' | 'language'>,
  ): Promise<ChunkRecord[]> {
    const { blocks, tables, outline } = await this.extractLayout(input, range, config.layoutRecognize, progress);

    const { levels, pivotLevel, strategy } = classifyHeadings(blocks, outline, this.classifierOptions);
    const sectionIds = assignSectionIds(levels, pivotLevel);
    this.logger.debug(`Heading strategy ${strategy}, pivot level ${pivotLevel}, ${sectionIds.at(-1) ?? 0} sections`);

    const items: MergeItem[] = blocks.map((block, index) => ({
      text: block.text,
      sectionId: sectionIds[index],
      positions: block.positions,
    }));
    const tableRecords: ChunkRecord[] = [];
    for (const table of tables) {
      if (!table.markup.trim()) {
        continue;
      }
      const positions = shiftTablePositions(table.positions, range.from);
      items.push({ text: table.markup, sectionId: TABLE_SECTION_ID, positions });
      tableRecords.push({ ...base, kind: 'table', content: table.markup, positions });
    }

    const chunks = this.merger.merge(items);
    progress(undefined, `Merged ${items.length} items into ${chunks.length} chunks`);

    return [
      ...tableRecords,
      ...chunks.map((content): ChunkRecord => ({ ...base, kind: 'text', content })),
    ];
  }

  private async extractLayout(
    input: string | Buffer,
    range: PageRange,
    recognizer: string,
    progress: ProgressCallback,
  ): Promise<LayoutExtraction> {
    if (recognizer === PLAIN_TEXT_RECOGNIZER) {
      return this.plainTextEngine.extract(input, range, progress);
    }

    if (isVisionRecognizer(recognizer)) {
      try {
        if (!this.visionLayoutEngineFactory) {
          throw new Error('no vision layout engine configured');
        }
        const extraction = await this.visionLayoutEngineFactory(recognizer).extract(input, range, progress);
        progress(0.8, 'Vision model parsing completed.');
        return { blocks: extraction.blocks, tables: extraction.tables };
      } catch (error: unknown) {
        this.logger.warn(`Failed to use vision model ${recognizer}: ${error instanceof Error ? error.message : String(error)}. Falling back to ${DEEPDOC_RECOGNIZER}.`);
      }
    }

    if (!this.layoutEngine) {
      throw new LayoutEngineUnavailableError(DEEPDOC_RECOGNIZER);
    }
    const extraction = await this.layoutEngine.extract(input, range, progress);
    const blocks: Block[] = extraction.blocks.map((block) => ({ ...block, text: cleanBlockText(block.text) }));
    return { ...extraction, blocks };
  }

  private async parseDocx(
    input: string | Buffer,
    range: PageRange,
    config: ParserConfig,
    progress: ProgressCallback,
    base: Pick<ChunkRecord, 'docName' | 'title' | 'language'>,
  ): Promise<ChunkRecord[]> {
    const describer = this.createDescriber(config.layoutRecognize, progress);
    const buffer = typeof input === 'string' ? await readFile(input) : input;
    const document = await this.docxReader.read(buffer);

    const reconstructor = new QaReconstructor({ describer, composer: this.imageComposer });
    const units = await reconstructor.reconstruct(document.paragraphs, range);

    const records: ChunkRecord[] = [];
    for (const rows of document.tables) {
      const markup = normalizeTable(rows);
      if (markup) {
        records.push({ ...base, kind: 'table', content: markup });
      }
    }
    for (const unit of units) {
      const record: ChunkRecord = {
        ...base,
        kind: unit.answerImage ? 'image' : 'text',
        content: `${unit.headingPath.join('\n')}\n${unit.answerText}`,
      };
      if (unit.answerImage) {
        record.image = unit.answerImage;
      }
      records.push(record);
    }
    return records;
  }

  private createDescriber(recognizer: string, progress: ProgressCallback): ImageDescriber | undefined {
    if (!isVisionRecognizer(recognizer) || !this.imageDescriberFactory) {
      return undefined;
    }
    try {
      const describer = this.imageDescriberFactory(recognizer);
      progress(0.05, `Using ${recognizer} for image processing in DOCX.`);
      return describer;
    } catch (error: unknown) {
      this.logger.info(`Vision model ${recognizer} not available for DOCX: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }
}
