/**
 * EstimatingTokenizer 单元测试
 */

import { describe, expect, it } from 'vitest';
import { EstimatingTokenizer } from '../../src/document/Tokenizer';

describe('EstimatingTokenizer', () => {
  const tokenizer = new EstimatingTokenizer();

  it('should count four latin characters as one token', () => {
    expect(tokenizer.count('abcd')).toBe(1);
    expect(tokenizer.count('abcde')).toBe(2);
  });

  it('should weigh CJK characters more', () => {
    expect(tokenizer.count('你好吗')).toBe(2);
  });

  it('should combine both weights', () => {
    expect(tokenizer.count('ab你')).toBe(2);
  });

  it('should return 0 for empty text', () => {
    expect(tokenizer.count('')).toBe(0);
  });
});
