/**
 * Base error for all export failures.
 */
export class ExportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ExportError";
  }
}

/**
 * Thrown when a structured export does not have the expected shape.
 */
export class ExportFormatError extends ExportError {
  /** Dotted path of the offending field, e.g. `trials[3].trajectory`. */
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "ExportFormatError";
    this.path = path;
  }
}

/**
 * Thrown when session files cannot be written. The in-memory record is
 * left untouched.
 */
export class PersistenceError extends ExportError {
  readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    super(
      `Failed to write session file: ${filePath}`,
      cause instanceof Error ? { cause } : undefined,
    );
    this.name = "PersistenceError";
    this.filePath = filePath;
  }
}
