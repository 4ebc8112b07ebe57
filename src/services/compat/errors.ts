export class CompatError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 422) {
    super(message);
    this.name = 'CompatError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

/** The document matches no known schema generation. */
export class UnknownVersionError extends CompatError {
  constructor(message = 'Cannot detect API version from document') {
    super('UNKNOWN_VERSION', message);
    this.name = 'UnknownVersionError';
  }
}

/** A v3 wrapper carried no records. */
export class EmptyPayloadError extends CompatError {
  constructor(message = 'v3 payload has an empty data array') {
    super('EMPTY_PAYLOAD', message);
    this.name = 'EmptyPayloadError';
  }
}

export class DateParseError extends CompatError {
  readonly input: unknown;

  constructor(input: unknown) {
    super('DATE_PARSE_ERROR', `Cannot parse date: ${String(input)}`);
    this.name = 'DateParseError';
    this.input = input;
  }
}
