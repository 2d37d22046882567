/**
 * QaReconstructor 单元测试
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ImageComposer } from '../../src/document/ImageComposer';
import { IMAGE_EXTRACTION_PROMPT } from '../../src/document/ImageDescriber';
import type { SourceParagraph } from '../../src/document/QaReconstructor';
import { QaReconstructor, questionLevel } from '../../src/document/QaReconstructor';
import type { DocumentImage } from '../../src/document/types';

const ALL_PAGES = { from: 0, to: 100000 };

function p(text: string, extras: Partial<SourceParagraph> = {}): SourceParagraph {
  return { text, styleName: 'Normal', runs: [], ...extras };
}

function h(text: string, level: number): SourceParagraph {
  return p(text, { styleName: `Heading ${level}` });
}

function pageBreak(paragraph: SourceParagraph): SourceParagraph {
  return { ...paragraph, runs: [{ renderedPageBreak: false, pageBreak: true }] };
}

function image(label: string): DocumentImage {
  return { data: Buffer.from(label), mimeType: 'image/png' };
}

describe('questionLevel()', () => {
  it('should read the level from heading styles', () => {
    expect(questionLevel({ text: '\u3000Title ', styleName: 'Heading 2' })).toEqual({ level: 2, text: 'Title' });
    expect(questionLevel({ text: 'Deep', styleName: 'Heading 10' })).toEqual({ level: 10, text: 'Deep' });
  });

  it('should return 0 for body styles', () => {
    expect(questionLevel({ text: 'Body', styleName: 'Normal' })).toEqual({ level: 0, text: 'Body' });
    expect(questionLevel({ text: 'Odd', styleName: 'Heading' })).toEqual({ level: 0, text: 'Odd' });
  });
});

describe('QaReconstructor', () => {
  describe('reconstruct()', () => {
    it('should emit one unit per heading path with an answer', async () => {
      const units = await new QaReconstructor().reconstruct(
        [h('H1', 1), p('P1'), h('H2', 2), p('P2'), h('H3', 1)],
        ALL_PAGES,
      );

      expect(units).toEqual([
        { headingPath: ['H1'], answerText: 'P1' },
        { headingPath: ['H1', 'H2'], answerText: 'P2' },
      ]);
    });

    it('should replace siblings on the heading path', async () => {
      const units = await new QaReconstructor().reconstruct(
        [h('Guide', 1), h('Install', 2), p('Run setup.'), h('Remove', 2), p('Run uninstall.')],
        ALL_PAGES,
      );

      expect(units).toEqual([
        { headingPath: ['Guide', 'Install'], answerText: 'Run setup.' },
        { headingPath: ['Guide', 'Remove'], answerText: 'Run uninstall.' },
      ]);
    });

    it('should drop content before the first heading', async () => {
      const units = await new QaReconstructor().reconstruct([p('Preface'), h('H1', 1), p('P1')], ALL_PAGES);

      expect(units).toEqual([{ headingPath: ['H1'], answerText: 'P1' }]);
    });

    it('should join answer lines and skip blank ones', async () => {
      const units = await new QaReconstructor().reconstruct(
        [h('H1', 1), p('line one'), p('   '), p('line two')],
        ALL_PAGES,
      );

      expect(units).toEqual([{ headingPath: ['H1'], answerText: 'line one\nline two' }]);
    });

    it('should emit nothing for a heading followed only by a blank paragraph', async () => {
      const units = await new QaReconstructor().reconstruct([h('H1', 1), p(''), h('H2', 2)], ALL_PAGES);

      expect(units).toEqual([]);
    });

    it('should treat headings deeper than level 6 as body text', async () => {
      const units = await new QaReconstructor().reconstruct([h('H1', 1), h('Deep', 7), p('P')], ALL_PAGES);

      expect(units).toEqual([{ headingPath: ['H1'], answerText: 'Deep\nP' }]);
    });

    it('should only read paragraphs inside the page range', async () => {
      const units = await new QaReconstructor().reconstruct(
        [pageBreak(h('Skipped', 1)), h('Kept', 1), pageBreak(p('Body')), p('Late'), h('Gone', 1)],
        { from: 1, to: 2 },
      );

      expect(units).toEqual([{ headingPath: ['Kept'], answerText: 'Body' }]);
    });

    it('should count a rendered page break once per run', async () => {
      const both: SourceParagraph = { ...p('Body'), runs: [{ renderedPageBreak: true, pageBreak: true }] };

      const units = await new QaReconstructor().reconstruct(
        [h('H1', 1), both, p('Second page'), h('Out', 1)],
        { from: 0, to: 2 },
      );

      expect(units).toEqual([{ headingPath: ['H1'], answerText: 'Body\nSecond page' }]);
    });
  });

  describe('images', () => {
    let composer: ImageComposer;
    const stacked = image('stacked');

    beforeEach(() => {
      composer = { stack: vi.fn().mockResolvedValue(stacked) };
    });

    it('should replace an image with its description', async () => {
      const figure = image('figure');
      const describer = { describe: vi.fn().mockResolvedValue('a diagram') };

      const units = await new QaReconstructor({ describer, composer }).reconstruct(
        [h('H1', 1), p('See figure', { image: figure })],
        ALL_PAGES,
      );

      expect(units).toEqual([{ headingPath: ['H1'], answerText: 'See figure\n[Image Content]: a diagram' }]);
      expect(describer.describe).toHaveBeenCalledWith(figure, IMAGE_EXTRACTION_PROMPT);
    });

    it('should keep the image when the describer fails', async () => {
      const figure = image('figure');
      const describer = { describe: vi.fn().mockRejectedValue(new Error('model down')) };

      const units = await new QaReconstructor({ describer, composer }).reconstruct(
        [h('H1', 1), p('See figure', { image: figure })],
        ALL_PAGES,
      );

      expect(units).toEqual([{ headingPath: ['H1'], answerText: 'See figure', answerImage: figure }]);
      expect(composer.stack).not.toHaveBeenCalled();
    });

    it('should stack consecutive images of one answer', async () => {
      const first = image('first');
      const second = image('second');

      const units = await new QaReconstructor({ composer }).reconstruct(
        [h('H1', 1), p('', { image: first }), p('', { image: second })],
        ALL_PAGES,
      );

      expect(units).toEqual([{ headingPath: ['H1'], answerText: '', answerImage: stacked }]);
      expect(composer.stack).toHaveBeenCalledWith(first, second);
    });

    it('should keep the latest image without a composer', async () => {
      const second = image('second');

      const units = await new QaReconstructor().reconstruct(
        [h('H1', 1), p('', { image: image('first') }), p('', { image: second })],
        ALL_PAGES,
      );

      expect(units).toEqual([{ headingPath: ['H1'], answerText: '', answerImage: second }]);
    });

    it('should flush an image-only answer at the next heading', async () => {
      const figure = image('figure');

      const units = await new QaReconstructor({ composer }).reconstruct(
        [h('H1', 1), p('', { image: figure }), h('H2', 1)],
        ALL_PAGES,
      );

      expect(units).toEqual([{ headingPath: ['H1'], answerText: '', answerImage: figure }]);
    });
  });
});
