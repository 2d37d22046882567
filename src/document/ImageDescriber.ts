/**
 * ImageDescriber - 用视觉模型把图片转成文本
 */

import { createOpenAI } from '@ai-sdk/openai';
import { generateText } from 'ai';
import { getLoggerFor } from 'global-logger-factory';
import type { DocumentImage } from './types';

export const IMAGE_EXTRACTION_PROMPT = `Please extract the layout information from the image and output only the text content in Markdown format.

1. Ignore bounding boxes and coordinates.
2. Categories:
   - Picture: omit the text field.
   - Formula: output as LaTeX format (enclosed in $ or $$).
   - Table: MUST output as HTML table format with <table>, <tr>, <td>, <th> tags. Preserve all data and structure.
   - All other categories (Text, Title, Caption, etc.): output as Markdown.

3. Constraints:
   - The output text must be the original text from the image, with no translation.
   - All layout elements must be sorted according to human reading order.
   - Tables should be formatted as complete HTML tables without unnecessary spaces or newlines.

4. Final Output: A single Markdown document containing the extracted content with tables in HTML format.`;

export interface ImageDescriber {
  describe(image: DocumentImage, prompt: string): Promise<string>;
}

/**
 * 根据模型名创建描述器，模型不可用时抛出
 */
export type ImageDescriberFactory = (modelName: string) => ImageDescriber;

export interface OpenAiImageDescriberOptions {
  apiKey: string;
  /** OpenAI 兼容端点，默认 https://api.openai.com/v1 */
  baseUrl?: string;
  model: string;
}

/**
 * 基于 OpenAI 兼容接口的图片描述器
 */
export class OpenAiImageDescriber implements ImageDescriber {
  protected readonly logger = getLoggerFor(this);

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;

  public constructor(options: OpenAiImageDescriberOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? 'https://api.openai.com/v1';
    this.model = options.model;
  }

  public async describe(image: DocumentImage, prompt: string): Promise<string> {
    const provider = createOpenAI({ apiKey: this.apiKey, baseURL: this.baseUrl });
    this.logger.debug(`Describing ${image.data.length} bytes of ${image.mimeType} with ${this.model}`);

    const result = await generateText({
      model: provider.chat(this.model),
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: prompt },
            { type: 'image', image: image.data, mimeType: image.mimeType },
          ],
        },
      ],
    });
    return result.text;
  }
}
