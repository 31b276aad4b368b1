/**
 * Base error class for all typefmt errors
 */
export class TypefmtError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "TypefmtError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or CLI output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error raised while rendering a template: bad placeholder syntax,
 * argument index out of range or a spec that does not suit the argument
 */
export class FormatError extends TypefmtError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "FORMAT_ERROR", context);
    this.name = "FormatError";
  }
}

/**
 * Error for values that cannot be captured as format arguments
 */
export class ArgumentError extends TypefmtError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "ARGUMENT_ERROR", context);
    this.name = "ArgumentError";
  }
}

/**
 * Error for using a session after it was finalized or handed over
 */
export class SessionError extends TypefmtError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "SESSION_ERROR", context);
    this.name = "SessionError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends TypefmtError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}
