export class EffectiveDiffException extends Error {
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'EffectiveDiffException';
    this.cause = cause;
  }
}

/**
 * The input diff contradicts itself: inverted or overlapping ranges,
 * line numbers that do not match the hunk header, duplicate file pairs.
 */
export class MalformedDiffException extends EffectiveDiffException {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'MalformedDiffException';
  }
}

export class DiffParseException extends EffectiveDiffException {
  constructor(
    message: string,
    public readonly lineNumber: number,
    cause?: Error
  ) {
    super(`${message} (diff line ${lineNumber})`, cause);
    this.name = 'DiffParseException';
  }
}

/**
 * The re-diff collaborator failed, or returned hunks that fall outside
 * the residual text it was given.
 */
export class RediffException extends EffectiveDiffException {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'RediffException';
  }
}

export class FileContentException extends EffectiveDiffException {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'FileContentException';
  }
}

export class FileNotFoundException extends FileContentException {
  constructor(filePath: string, revision: string, cause?: Error) {
    super(`no ${revision} content for '${filePath}'`, filePath, cause);
    this.name = 'FileNotFoundException';
  }
}

export class FileReadException extends FileContentException {
  constructor(filePath: string, revision: string, cause?: Error) {
    super(`cannot read ${revision} content for '${filePath}'`, filePath, cause);
    this.name = 'FileReadException';
  }
}

export class ConfigException extends EffectiveDiffException {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ConfigException';
  }
}

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
