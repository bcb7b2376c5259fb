export class DocumentReadError extends Error {
  readonly file: string;

  constructor(file: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read ${file}: ${reason}`, { cause });
    this.name = 'DocumentReadError';
    this.file = file;
  }
}

export class UnsupportedDocumentError extends Error {
  readonly file: string;

  constructor(file: string) {
    super(`Unsupported document type: ${file}`);
    this.name = 'UnsupportedDocumentError';
    this.file = file;
  }
}
