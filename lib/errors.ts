export class SchemaError extends Error {
  readonly missingColumns: string[];

  constructor(missingColumns: string[], message: string) {
    super(message);
    this.name = "SchemaError";
    this.missingColumns = missingColumns;
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class DatasetNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`File not found at path: ${path}`);
    this.name = "DatasetNotFoundError";
    this.path = path;
  }
}
