/**
 * Base error for engine failures.
 */
export class EngineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EngineError";
  }
}

/**
 * Thrown when the host passes a value the engine cannot substitute a
 * default for (e.g. resizing the canvas to a non-positive size).
 */
export class ConfigurationError extends EngineError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "ConfigurationError";
    this.field = field;
  }
}
