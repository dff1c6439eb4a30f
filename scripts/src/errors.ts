export class FileNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`File not found or unreadable: ${path}`);
    this.name = "FileNotFoundError";
  }
}

export class FormatError extends Error {
  constructor(message: string, public readonly lineNumber: number, public readonly line: string) {
    super(`Line ${lineNumber}: ${message}`);
    this.name = "FormatError";
  }
}

export class ParseError extends Error {
  constructor(public readonly lineNumber: number, public readonly line: string, public readonly field: string) {
    super(`Line ${lineNumber}: could not convert ${JSON.stringify(field)} to a float`);
    this.name = "ParseError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type LineError = FormatError | ParseError;

export function isLineError(error: unknown): error is LineError {
  return error instanceof FormatError || error instanceof ParseError;
}
