/**
 * CLI 输出格式单元测试
 */

import { describe, expect, it } from 'vitest';
import { summarizeRecords, toPrintableRecords } from '../../src/cli/lib/output';
import type { ChunkRecord } from '../../src/document';

const base = { docName: 'manual.docx', title: 'manual', language: 'English' };

describe('cli output', () => {
  describe('toPrintableRecords()', () => {
    it('should replace image bytes with their size', () => {
      const records: ChunkRecord[] = [
        { ...base, kind: 'image', content: 'Q\nA', image: { data: Buffer.from('abcd'), mimeType: 'image/png' } },
        { ...base, kind: 'text', content: 'Q\nB' },
      ];

      expect(toPrintableRecords(records)).toEqual([
        { ...base, kind: 'image', content: 'Q\nA', image: { mimeType: 'image/png', bytes: 4 } },
        { ...base, kind: 'text', content: 'Q\nB' },
      ]);
    });
  });

  describe('summarizeRecords()', () => {
    it('should print index, kind and the first non-blank line', () => {
      const lines = summarizeRecords([
        { ...base, kind: 'text', content: '\nHeading\nBody' },
        { ...base, kind: 'table', content: '<table></table>' },
      ]);

      expect(lines).toEqual([
        '   1 text  Heading',
        '   2 table <table></table>',
      ]);
    });

    it('should cut long previews', () => {
      const [line] = summarizeRecords([{ ...base, kind: 'text', content: 'x'.repeat(70) }]);

      expect(line).toBe(`   1 text  ${'x'.repeat(60)}…`);
    });
  });
});
