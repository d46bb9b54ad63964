export class UnsupportedFormatError extends Error {
  extension: string;

  constructor(extension: string) {
    super(`Unsupported file format: ${extension ? `.${extension}` : "(none)"}`);
    this.name = "UnsupportedFormatError";
    this.extension = extension;
  }
}

export class SourceReadError extends Error {
  fileName: string;

  constructor(message: string, fileName: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SourceReadError";
    this.fileName = fileName;
  }
}

export class InvalidOptionsError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid options: ${issues.join("; ")}`);
    this.name = "InvalidOptionsError";
    this.issues = issues;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
