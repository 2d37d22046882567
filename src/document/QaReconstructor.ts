/**
 * QaReconstructor - 从段落流重建层级问答单元
 *
 * 标题段落入栈（出栈直到栈顶层级小于当前层级），非标题段落累积为答案。
 * 遇到新标题或流结束时，以当前标题路径为问题输出一个单元。
 */

import { getLoggerFor } from 'global-logger-factory';
import type { ImageComposer } from './ImageComposer';
import type { ImageDescriber } from './ImageDescriber';
import { IMAGE_EXTRACTION_PROMPT } from './ImageDescriber';
import type { DocumentImage, PageRange, QaUnit } from './types';

const MAX_HEADING_LEVEL = 6;

/**
 * 段落中的一个 run，只关心分页标记
 */
export interface SourceRun {
  /** 渲染时留下的分页标记 */
  renderedPageBreak: boolean;
  /** 显式分页符 */
  pageBreak: boolean;
}

/**
 * 文档对象模型读出的段落
 */
export interface SourceParagraph {
  text: string;
  styleName: string;
  runs: SourceRun[];
  image?: DocumentImage;
}

export interface QaReconstructorOptions {
  /** 配置后图片会被替换为描述文本 */
  describer?: ImageDescriber;
  prompt?: string;
  /** 没有描述器时用于拼接图片 */
  composer?: ImageComposer;
}

/**
 * 段落的问题层级：样式 "Heading N" 为 N，其余为 0
 */
export function questionLevel(paragraph: Pick<SourceParagraph, 'text' | 'styleName'>): { level: number; text: string } {
  const text = paragraph.text.replace(/\u3000/g, ' ').trim();
  if (paragraph.styleName.startsWith('Heading')) {
    const level = Number.parseInt(paragraph.styleName.split(' ').at(-1) ?? '', 10);
    return { level: Number.isNaN(level) ? 0 : level, text };
  }
  return { level: 0, text };
}

/**
 * 单个文档的处理状态
 */
class QaContext {
  public page = 0;
  public answer: string[] = [];
  public image: DocumentImage | undefined;
  public readonly headings: string[] = [];
  public readonly levels: number[] = [];
  public readonly units: QaUnit[] = [];

  /** 空白段落不计入答案，只有空白段落的标题不产出单元 */
  public appendAnswer(text: string): void {
    if (text.trim()) {
      this.answer.push(text);
    }
  }

  public flush(): void {
    if (this.answer.length === 0 && !this.image) {
      return;
    }
    if (this.headings.length > 0) {
      const unit: QaUnit = { headingPath: [...this.headings], answerText: this.answer.join('\n') };
      if (this.image) {
        unit.answerImage = this.image;
      }
      this.units.push(unit);
    }
    this.answer = [];
    this.image = undefined;
  }

  public pushHeading(text: string, level: number): void {
    while (this.levels.length > 0 && level <= this.levels[this.levels.length - 1]) {
      this.headings.pop();
      this.levels.pop();
    }
    this.headings.push(text);
    this.levels.push(level);
  }
}

export class QaReconstructor {
  protected readonly logger = getLoggerFor(this);

  private readonly describer?: ImageDescriber;
  private readonly prompt: string;
  private readonly composer?: ImageComposer;

  public constructor(options: QaReconstructorOptions = {}) {
    this.describer = options.describer;
    this.prompt = options.prompt ?? IMAGE_EXTRACTION_PROMPT;
    this.composer = options.composer;
  }

  public async reconstruct(paragraphs: Iterable<SourceParagraph>, range: PageRange): Promise<QaUnit[]> {
    const context = new QaContext();

    for (const paragraph of paragraphs) {
      if (context.page > range.to) {
        break;
      }

      let level = 0;
      let text = '';
      if (context.page >= range.from && context.page < range.to && paragraph.text.trim()) {
        ({ level, text } = questionLevel(paragraph));
      }

      if (level === 0 || level > MAX_HEADING_LEVEL) {
        await this.appendContent(context, text, paragraph.image);
      } else {
        context.flush();
        context.pushHeading(text, level);
      }

      for (const run of paragraph.runs) {
        if (run.renderedPageBreak || run.pageBreak) {
          context.page++;
        }
      }
    }

    context.flush();
    return context.units;
  }

  private async appendContent(context: QaContext, text: string, image: DocumentImage | undefined): Promise<void> {
    if (image && this.describer) {
      try {
        const description = await this.describer.describe(image, this.prompt);
        context.appendAnswer(text);
        context.appendAnswer(`[Image Content]: ${description}`);
        return;
      } catch (error: unknown) {
        this.logger.warn(`Vision model error: ${error instanceof Error ? error.message : String(error)}. Using original image.`);
      }
    }
    context.appendAnswer(text);
    if (image) {
      context.image = await this.concatImage(context.image, image);
    }
  }

  private async concatImage(pending: DocumentImage | undefined, image: DocumentImage): Promise<DocumentImage> {
    if (!pending) {
      return image;
    }
    if (!this.composer) {
      this.logger.warn('No image composer configured, keeping the latest image only');
      return image;
    }
    return this.composer.stack(pending, image);
  }
}
