/**
 * 文件格式不受支持，在任何抽取工作开始前抛出
 */
export class UnsupportedFormatError extends Error {
  public constructor(public readonly fileName: string) {
    super(`File type not supported yet (pdf and docx supported): ${fileName}`);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * 结构不变量被破坏，属于数据契约错误，不可恢复
 */
export class StructuralInvariantError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'StructuralInvariantError';
  }
}

/**
 * 需要确定性版面引擎，但宿主没有注入
 */
export class LayoutEngineUnavailableError extends Error {
  public constructor(public readonly recognizer: string) {
    super(`No layout engine configured for recognizer: ${recognizer}`);
    this.name = 'LayoutEngineUnavailableError';
  }
}

/**
 * 文档来源既没有路径也没有内容
 */
export class InvalidSourceError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'InvalidSourceError';
  }
}
