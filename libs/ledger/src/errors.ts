export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class CsvFormatError extends Error {
  constructor(
    readonly file: string,
    readonly line: number | null,
    detail: string,
  ) {
    super(line == null ? `${file}: ${detail}` : `${file}:${line}: ${detail}`);
    this.name = "CsvFormatError";
  }
}
