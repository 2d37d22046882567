/**
 * DocxReader - 读取 .docx 的段落和表格
 *
 * 只读取正文直接包含的段落和表格，供问答重建和表格规范化使用
 */

import { DOMParser } from '@xmldom/xmldom';
import { getLoggerFor } from 'global-logger-factory';
import JSZip from 'jszip';
import type { SourceParagraph, SourceRun } from '../QaReconstructor';
import type { DocumentImage } from '../types';

export interface DocxDocument {
  paragraphs: SourceParagraph[];
  /** 每个表格为行 × 单元格文本，合并单元格按网格列重复 */
  tables: string[][][];
}

const DOCUMENT_PART = 'word/document.xml';
const STYLES_PART = 'word/styles.xml';
const RELS_PART = 'word/_rels/document.xml.rels';
const ELEMENT_NODE = 1;

const IMAGE_MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  bmp: 'image/bmp',
  tif: 'image/tiff',
  tiff: 'image/tiff',
  webp: 'image/webp',
};

/** 内置样式在 styles.xml 中是小写名，界面名首字母大写 */
const BUILTIN_STYLE_NAMES: Record<string, string> = {
  caption: 'Caption',
  footer: 'Footer',
  header: 'Header',
  normal: 'Normal',
  subtitle: 'Subtitle',
  title: 'Title',
};

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function childElements(parent: Element, tagName: string): Element[] {
  return Array.from(parent.childNodes).filter((node): node is Element => isElement(node) && node.tagName === tagName);
}

function firstChild(parent: Element, tagName: string): Element | undefined {
  return childElements(parent, tagName)[0];
}

function descendants(parent: Element, tagName: string): Element[] {
  return Array.from(parent.getElementsByTagName(tagName));
}

export function toUiStyleName(name: string): string {
  const heading = /^heading (\d+)$/i.exec(name);
  if (heading) {
    return `Heading ${heading[1]}`;
  }
  return BUILTIN_STYLE_NAMES[name.toLowerCase()] ?? name;
}

export class DocxReader {
  protected readonly logger = getLoggerFor(this);

  private readonly parser = new DOMParser();

  public async read(buffer: Buffer): Promise<DocxDocument> {
    const zip = await JSZip.loadAsync(buffer);
    const documentXml = await zip.file(DOCUMENT_PART)?.async('string');
    if (!documentXml) {
      throw new Error(`Not a Word document: missing ${DOCUMENT_PART}`);
    }

    const styles = this.readStyles(await zip.file(STYLES_PART)?.async('string'));
    const relations = this.readRelations(await zip.file(RELS_PART)?.async('string'));
    const body = this.parser.parseFromString(documentXml, 'application/xml').getElementsByTagName('w:body')[0];
    if (!body) {
      return { paragraphs: [], tables: [] };
    }

    const paragraphs: SourceParagraph[] = [];
    for (const element of childElements(body, 'w:p')) {
      paragraphs.push(await this.readParagraph(zip, element, styles, relations));
    }
    const tables = childElements(body, 'w:tbl').map((table) => this.readTable(table));

    this.logger.debug(`Read ${paragraphs.length} paragraphs and ${tables.length} tables`);
    return { paragraphs, tables };
  }

  private readStyles(xml: string | undefined): { names: Map<string, string>; defaultName: string } {
    const names = new Map<string, string>();
    let defaultName = 'Normal';
    if (!xml) {
      return { names, defaultName };
    }
    const root = this.parser.parseFromString(xml, 'application/xml');
    for (const style of Array.from(root.getElementsByTagName('w:style'))) {
      const id = style.getAttribute('w:styleId');
      const name = firstChild(style, 'w:name')?.getAttribute('w:val');
      if (!id || !name) {
        continue;
      }
      names.set(id, toUiStyleName(name));
      if (style.getAttribute('w:type') === 'paragraph' && style.getAttribute('w:default') === '1') {
        defaultName = toUiStyleName(name);
      }
    }
    return { names, defaultName };
  }

  private readRelations(xml: string | undefined): Map<string, string> {
    const relations = new Map<string, string>();
    if (!xml) {
      return relations;
    }
    const root = this.parser.parseFromString(xml, 'application/xml');
    for (const rel of Array.from(root.getElementsByTagName('Relationship'))) {
      const id = rel.getAttribute('Id');
      const target = rel.getAttribute('Target');
      if (id && target) {
        relations.set(id, target);
      }
    }
    return relations;
  }

  private async readParagraph(
    zip: JSZip,
    paragraph: Element,
    styles: { names: Map<string, string>; defaultName: string },
    relations: Map<string, string>,
  ): Promise<SourceParagraph> {
    const styleId = descendants(paragraph, 'w:pStyle')[0]?.getAttribute('w:val');
    const styleName = styleId ? styles.names.get(styleId) ?? styleId : styles.defaultName;

    const runs: SourceRun[] = childElements(paragraph, 'w:r').map((run) => ({
      renderedPageBreak: descendants(run, 'w:lastRenderedPageBreak').length > 0,
      pageBreak: descendants(run, 'w:br').some((br) => br.getAttribute('w:type') === 'page'),
    }));

    const result: SourceParagraph = {
      text: descendants(paragraph, 'w:r').map((run) => this.runText(run)).join(''),
      styleName,
      runs,
    };
    const image = await this.readPicture(zip, paragraph, relations);
    if (image) {
      result.image = image;
    }
    return result;
  }

  private runText(run: Element): string {
    let text = '';
    for (const node of Array.from(run.childNodes)) {
      if (!isElement(node)) {
        continue;
      }
      switch (node.tagName) {
        case 'w:t':
          text += node.textContent ?? '';
          break;
        case 'w:tab':
          text += '\t';
          break;
        case 'w:cr':
          text += '\n';
          break;
        case 'w:br':
          if (node.getAttribute('w:type') !== 'page') {
            text += '\n';
          }
          break;
        default:
          break;
      }
    }
    return text;
  }

  private async readPicture(
    zip: JSZip,
    paragraph: Element,
    relations: Map<string, string>,
  ): Promise<DocumentImage | undefined> {
    const picture = descendants(paragraph, 'pic:pic')[0];
    const embed = picture ? descendants(picture, 'a:blip')[0]?.getAttribute('r:embed') : undefined;
    if (!embed) {
      return undefined;
    }
    const target = relations.get(embed);
    if (!target) {
      this.logger.warn(`Image relation ${embed} not found`);
      return undefined;
    }
    const path = target.startsWith('/') ? target.slice(1) : `word/${target}`;
    const data = await zip.file(path)?.async('nodebuffer');
    if (!data) {
      this.logger.warn(`Image part ${path} not found`);
      return undefined;
    }
    const extension = path.slice(path.lastIndexOf('.') + 1).toLowerCase();
    return { data, mimeType: IMAGE_MIME_TYPES[extension] ?? 'application/octet-stream' };
  }

  private readTable(table: Element): string[][] {
    const rows: string[][] = [];
    for (const row of childElements(table, 'w:tr')) {
      const above = rows.at(-1) ?? [];
      const cells: string[] = [];
      for (const cell of childElements(row, 'w:tc')) {
        const properties = firstChild(cell, 'w:tcPr');
        const span = Number.parseInt(
          (properties && firstChild(properties, 'w:gridSpan')?.getAttribute('w:val')) ?? '1',
          10,
        ) || 1;
        const vMerge = properties ? firstChild(properties, 'w:vMerge') : undefined;
        const continues = vMerge !== undefined && vMerge.getAttribute('w:val') !== 'restart';
        const text = continues ?
          above[cells.length] ?? '' :
          childElements(cell, 'w:p')
            .map((p) => descendants(p, 'w:r').map((run) => this.runText(run)).join(''))
            .join('\n');
        for (let i = 0; i < span; i++) {
          cells.push(text);
        }
      }
      rows.push(cells);
    }
    return rows;
  }
}
