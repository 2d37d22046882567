/**
 * 解析配置
 */

export const DEEPDOC_RECOGNIZER = 'DeepDOC';
export const PLAIN_TEXT_RECOGNIZER = 'Plain Text';

/**
 * 宿主传入的原始配置（snake_case）
 */
export interface ParserConfigBundle {
  chunk_token_num?: unknown;
  delimiter?: unknown;
  layout_recognize?: unknown;
}

export interface ParserConfig {
  /** 仅作为元数据透传，合并阈值固定 */
  chunkTokenNum: number;
  /** 句子分隔符，由分词器使用 */
  delimiter: string;
  /** 'DeepDOC'、'Plain Text' 或视觉模型名 */
  layoutRecognize: string;
}

export const DEFAULT_PARSER_CONFIG: Readonly<ParserConfig> = {
  chunkTokenNum: 512,
  delimiter: '\n!?。；！？',
  layoutRecognize: DEEPDOC_RECOGNIZER,
};

export function normalizeParserConfig(bundle: ParserConfigBundle = {}): ParserConfig {
  const config: ParserConfig = { ...DEFAULT_PARSER_CONFIG };

  if (bundle.chunk_token_num !== undefined) {
    const value = Number(bundle.chunk_token_num);
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`chunk_token_num must be a positive integer, got: ${String(bundle.chunk_token_num)}`);
    }
    config.chunkTokenNum = value;
  }

  if (bundle.delimiter !== undefined) {
    if (typeof bundle.delimiter !== 'string') {
      throw new Error('delimiter must be a string');
    }
    config.delimiter = bundle.delimiter;
  }

  if (bundle.layout_recognize !== undefined) {
    if (typeof bundle.layout_recognize !== 'string' || bundle.layout_recognize.trim() === '') {
      throw new Error('layout_recognize must be a non-empty string');
    }
    config.layoutRecognize = bundle.layout_recognize.trim();
  }

  return config;
}

/**
 * 既不是确定性引擎也不是纯文本时，layout_recognize 是视觉模型名
 */
export function isVisionRecognizer(recognizer: string): boolean {
  return recognizer !== DEEPDOC_RECOGNIZER && recognizer !== PLAIN_TEXT_RECOGNIZER;
}
