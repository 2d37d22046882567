/**
 * ParserConfig 单元测试
 */

import { describe, expect, it } from 'vitest';
import { DEFAULT_PARSER_CONFIG, isVisionRecognizer, normalizeParserConfig } from '../../src/document/ParserConfig';

describe('ParserConfig', () => {
  describe('normalizeParserConfig()', () => {
    it('should return defaults for an empty bundle', () => {
      expect(normalizeParserConfig()).toEqual({
        chunkTokenNum: 512,
        delimiter: '\n!?。；！？',
        layoutRecognize: 'DeepDOC',
      });
      expect(normalizeParserConfig({})).toEqual(DEFAULT_PARSER_CONFIG);
    });

    it('should map snake_case keys', () => {
      expect(normalizeParserConfig({ chunk_token_num: '256', delimiter: '\n', layout_recognize: '  Plain Text ' }))
        .toEqual({ chunkTokenNum: 256, delimiter: '\n', layoutRecognize: 'Plain Text' });
    });

    it('should reject a bad chunk size', () => {
      expect(() => normalizeParserConfig({ chunk_token_num: 'abc' }))
        .toThrow('chunk_token_num must be a positive integer, got: abc');
      expect(() => normalizeParserConfig({ chunk_token_num: 12.5 }))
        .toThrow('chunk_token_num must be a positive integer, got: 12.5');
    });

    it('should reject bad strings', () => {
      expect(() => normalizeParserConfig({ delimiter: 3 })).toThrow('delimiter must be a string');
      expect(() => normalizeParserConfig({ layout_recognize: ' ' })).toThrow('layout_recognize must be a non-empty string');
    });
  });

  describe('isVisionRecognizer()', () => {
    it('should treat any other name as a vision model', () => {
      expect(isVisionRecognizer('DeepDOC')).toBe(false);
      expect(isVisionRecognizer('Plain Text')).toBe(false);
      expect(isVisionRecognizer('qwen-vl-max')).toBe(true);
    });
  });
});
