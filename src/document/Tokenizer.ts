/**
 * Counts sub-word units of a text. Only the count is used by the merger.
 */
export interface Tokenizer {
  count(text: string): number;
}

/**
 * Approximate token counter: CJK characters weigh 1/1.5 token, everything
 * else 1/4 token.
 */
export class EstimatingTokenizer implements Tokenizer {
  public count(text: string): number {
    if (!text) {
      return 0;
    }
    let cjkChars = 0;
    let otherChars = 0;
    for (const char of text) {
      const code = char.charCodeAt(0);
      if (
        (code >= 0x4e00 && code <= 0x9fff) ||
        (code >= 0x3400 && code <= 0x4dbf) ||
        (code >= 0xf900 && code <= 0xfaff) ||
        (code >= 0x3040 && code <= 0x309f) ||
        (code >= 0x30a0 && code <= 0x30ff) ||
        (code >= 0xac00 && code <= 0xd7af)
      ) {
        cjkChars++;
      } else {
        otherChars++;
      }
    }
    return Math.ceil(cjkChars / 1.5 + otherChars / 4);
  }
}
