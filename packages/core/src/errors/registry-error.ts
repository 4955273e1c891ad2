/**
 * Failure categories raised by parsing, lookup and conversion.
 *
 * Validation problems are not listed here: they are returned as data.
 */
export enum RegistryErrorCode {
  MISSING_FIELD = 'missing_field',
  INVALID_DOCUMENT = 'invalid_document',
  AGGREGATE_VALIDATION = 'aggregate_validation',
  INVALID_ENTRY = 'invalid_entry',
  UNSUPPORTED_TRANSPORT = 'unsupported_transport',
  NOT_FOUND = 'not_found',
}

/**
 * Joins field errors as `field: message` pairs separated by `, `.
 */
export function formatFieldErrors(errors: Readonly<Record<string, string>>): string {
  return Object.entries(errors)
    .map(([field, message]) => `${field}: ${message}`)
    .join(', ');
}

/**
 * Error raised by registry operations. Carries a {@link RegistryErrorCode}
 * so callers can tell a missing server from an unsupported conversion.
 */
export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  public readonly details?: Readonly<Record<string, string>>;

  public constructor(
    message: string,
    code: RegistryErrorCode,
    details?: Readonly<Record<string, string>>,
  ) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
    this.details = details;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, RegistryError.prototype);
  }

  /**
   * A required top-level section of a registry document is absent.
   */
  public static missingField(message: string): RegistryError {
    return new RegistryError(message, RegistryErrorCode.MISSING_FIELD);
  }

  public static invalidDocument(message: string): RegistryError {
    return new RegistryError(message, RegistryErrorCode.INVALID_DOCUMENT);
  }

  /**
   * A server entry inside a registry document failed validation.
   */
  public static aggregateValidation(
    serverId: string,
    errors: Readonly<Record<string, string>>,
  ): RegistryError {
    return new RegistryError(
      `Validation errors for server '${serverId}': ${formatFieldErrors(errors)}`,
      RegistryErrorCode.AGGREGATE_VALIDATION,
      errors,
    );
  }

  /**
   * A single raw entry handed to the parser is not acceptable.
   */
  public static invalidEntry(errors: Readonly<Record<string, string>>): RegistryError {
    return new RegistryError(
      `Invalid server entry: ${formatFieldErrors(errors)}`,
      RegistryErrorCode.INVALID_ENTRY,
      errors,
    );
  }

  /**
   * @param format - Display name of the target format, e.g. `DXT manifest`
   * @param allowed - Transport(s) the format accepts, e.g. `stdio`
   * @param actual - Transport of the entry being converted
   */
  public static unsupportedTransport(
    format: string,
    allowed: string,
    actual: string,
  ): RegistryError {
    return new RegistryError(
      `${format} only supports ${allowed} transport, got ${actual}`,
      RegistryErrorCode.UNSUPPORTED_TRANSPORT,
    );
  }

  public static notFound(what: string): RegistryError {
    return new RegistryError(`${what} not found`, RegistryErrorCode.NOT_FOUND);
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Type guard for {@link RegistryError}, optionally narrowed to one code.
 */
export function isRegistryError(
  error: unknown,
  code?: RegistryErrorCode,
): error is RegistryError {
  return error instanceof RegistryError && (code === undefined || error.code === code);
}
