export type PolicyParseErrorKind = 'malformed-input' | 'incomplete-metadata';

export class PolicyParseError extends Error {
  constructor(
    message: string,
    public readonly kind: PolicyParseErrorKind,
    public readonly statusCode: number = 422
  ) {
    super(message);
    this.name = 'PolicyParseError';
  }
}

/**
 * A section block has no usable header.
 */
export class MalformedInputError extends PolicyParseError {
  constructor(message: string, public readonly line?: number) {
    super(line ? `line ${line}: ${message}` : message, 'malformed-input');
    this.name = 'MalformedInputError';
  }
}

/**
 * The front matter lacks a version or a publication date.
 */
export class IncompleteMetadataError extends PolicyParseError {
  constructor(message: string) {
    super(message, 'incomplete-metadata');
    this.name = 'IncompleteMetadataError';
  }
}
