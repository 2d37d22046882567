import { readFile } from 'node:fs/promises';
import { getLoggerFor } from 'global-logger-factory';
import type { Block, OutlineEntry, PageRange, ProgressCallback } from '../types';
import type { LayoutEngine, LayoutExtraction } from './LayoutEngine';

/** pdf.js 文本项；带标记的内容项没有 str */
type PdfContentItem = { str: string; transform: number[] } | { type: string };

/** pdf.js 书签节点 */
interface PdfOutlineNode {
  title: string;
  items: PdfOutlineNode[];
}

const NO_POSITION = { page: 0, left: 0, right: 0, top: 0, bottom: 0 };

function renderPage(items: PdfContentItem[]): string {
  let lastY: number | undefined;
  let text = '';
  for (const item of items) {
    if (!('str' in item)) {
      continue;
    }
    const y = item.transform[5];
    text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

/**
 * 深度优先展开书签，顶层为 level 0
 */
export function flattenOutline(nodes: PdfOutlineNode[], level = 0): OutlineEntry[] {
  return nodes.flatMap((node) => [
    { text: node.title, level },
    ...flattenOutline(node.items, level + 1),
  ]);
}

/**
 * Text-only PDF extraction: one block per line, no geometry, no tables.
 * The document's bookmarks are returned as the outline.
 */
export class PlainTextLayoutEngine implements LayoutEngine {
  protected readonly logger = getLoggerFor(this);

  public async extract(input: string | Buffer, range: PageRange, progress: ProgressCallback): Promise<LayoutExtraction> {
    const buffer = typeof input === 'string' ? await readFile(input) : input;
    const pdfjs = await import('pdfjs-dist');

    const doc = await pdfjs.getDocument({ data: new Uint8Array(buffer), verbosity: 0 }).promise;
    const texts: string[] = [];
    let outline: OutlineEntry[] = [];
    try {
      const last = Math.min(range.to, doc.numPages);
      for (let pageNumber = range.from + 1; pageNumber <= last; pageNumber++) {
        const page = await doc.getPage(pageNumber);
        const content = await page.getTextContent();
        texts.push(renderPage(content.items));
      }
      outline = flattenOutline((await doc.getOutline()) ?? []);
    } finally {
      await doc.destroy();
    }

    const blocks: Block[] = texts
      .flatMap((text) => text.split('\n'))
      .filter((line) => line.trim().length > 0)
      .map((line) => ({ text: line, layoutLabel: '', positions: [NO_POSITION] }));

    this.logger.debug(`Extracted ${blocks.length} lines and ${outline.length} outline entries from ${texts.length} pages`);
    progress(0.67, `Extracted text of ${texts.length} pages`);
    return { blocks, tables: [], outline };
  }
}
