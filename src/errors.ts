export type CatalogErrorCode = "CATALOG_MISSING" | "CATALOG_EMPTY";

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;
  readonly path: string;

  constructor(code: CatalogErrorCode, filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CatalogError";
    this.code = code;
    this.path = filePath;
  }
}

export class CatalogMissingError extends CatalogError {
  constructor(filePath: string, cause?: unknown) {
    super("CATALOG_MISSING", filePath, `Catalog file not found or unreadable: ${filePath}`, { cause });
    this.name = "CatalogMissingError";
  }
}

export class CatalogEmptyError extends CatalogError {
  readonly skippedCount: number;

  constructor(filePath: string, skippedCount: number) {
    super("CATALOG_EMPTY", filePath, `No valid songs loaded from ${filePath}. Check the file format.`);
    this.name = "CatalogEmptyError";
    this.skippedCount = skippedCount;
  }
}

export class SessionAbortedError extends Error {
  constructor() {
    super("Input closed before the session finished");
    this.name = "SessionAbortedError";
  }
}
