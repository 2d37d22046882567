/**
 * BulletPatterns - 标题编号样式
 *
 * 每个类别内的模式按层级从高到低排列，模式下标即标题层级
 */

export interface BulletCategory {
  name: string;
  patterns: RegExp[];
}

const CJK_NUM = '零一二三四五六七八九十百';

export const BULLET_CATEGORIES: readonly BulletCategory[] = [
  {
    name: 'cjk-legal',
    patterns: [
      new RegExp(`^第[${CJK_NUM}0-9]+(分?编|部分)`),
      new RegExp(`^第[${CJK_NUM}0-9]+章`),
      new RegExp(`^第[${CJK_NUM}0-9]+节`),
      new RegExp(`^第[${CJK_NUM}0-9]+条`),
      new RegExp(`^[\\(（][${CJK_NUM}]+[\\)）]`),
    ],
  },
  {
    name: 'decimal',
    patterns: [
      /^第[0-9]+章/,
      /^第[0-9]+节/,
      /^[0-9]{0,2}[. 、]/,
      /^[0-9]{0,2}\.[0-9]{0,2}[^a-zA-Z/%~-]/,
      /^[0-9]{0,2}\.[0-9]{0,2}\.[0-9]{0,2}/,
      /^[0-9]{0,2}\.[0-9]{0,2}\.[0-9]{0,2}\.[0-9]{0,2}/,
    ],
  },
  {
    name: 'cjk-numeral',
    patterns: [
      new RegExp(`^第[${CJK_NUM}0-9]+章`),
      new RegExp(`^第[${CJK_NUM}0-9]+节`),
      new RegExp(`^[${CJK_NUM}]+[ 、]`),
      new RegExp(`^[\\(（][${CJK_NUM}]+[\\)）]`),
      /^[(（][0-9]{0,2}[)）]/,
    ],
  },
  {
    name: 'english',
    patterns: [
      /^PART (ONE|TWO|THREE|FOUR|FIVE|SIX|SEVEN|EIGHT|NINE|TEN)/,
      /^Chapter (I+V?|VI*|XI|IX|X)/,
      /^Section [0-9]+/,
      /^Article [0-9]+/,
    ],
  },
  {
    name: 'markdown',
    patterns: [
      /^#[^#]/,
      /^##[^#]/,
      /^###.*/,
      /^####.*/,
      /^#####.*/,
      /^######.*/,
    ],
  },
];

const NOT_BULLET = [/^0/, /^[0-9]+ +[0-9~个只-]/, /^[0-9]+\.{2,}/];

/**
 * 形如编号但不是编号，如 "0.5"、"12 3"、"7..."
 */
export function isNotBullet(line: string): boolean {
  return NOT_BULLET.some((pattern) => pattern.test(line));
}

/**
 * 文本读起来像正文句子而不是标题
 */
export function isNotTitle(text: string): boolean {
  if (new RegExp(`^第[${CJK_NUM}0-9]+条`).test(text)) {
    return false;
  }
  const words = text.trim().split(/\s+/).filter(Boolean);
  if (words.length > 12 || (!text.includes(' ') && Array.from(text).length >= 32)) {
    return true;
  }
  return /[,;，。；！!]/.test(text);
}

/**
 * 返回命中模式的下标，没有命中返回 -1
 */
export function matchBulletLevel(category: BulletCategory, text: string): number {
  return category.patterns.findIndex((pattern) => pattern.test(text));
}

/**
 * 统计每个类别命中的块数，返回命中最多的类别下标；都未命中时返回 -1
 */
export function detectBulletCategory(texts: readonly string[]): number {
  const hits = BULLET_CATEGORIES.map((category) =>
    texts.filter((raw) => {
      const text = raw.trim();
      return matchBulletLevel(category, text) >= 0 && !isNotBullet(text);
    }).length);

  let best = -1;
  let maximum = 0;
  hits.forEach((count, index) => {
    if (count > maximum) {
      best = index;
      maximum = count;
    }
  });
  return best;
}
