/** Base error for the SDK. */
export class ChatWireError extends Error {
  readonly name: string = 'ChatWireError';
}

export class InvalidRole extends ChatWireError {
  readonly name: string = 'InvalidRole';
  constructor(public readonly role: string) {
    super(`invalid role: ${JSON.stringify(role)}`);
  }
}

/** A JSON value does not have the shape expected at `path`. */
export class SchemaError extends ChatWireError {
  readonly name: string = 'SchemaError';
  constructor(public readonly path: string, message: string) {
    super(path ? `${path}: ${message}` : message);
  }
}

export class MissingContent extends ChatWireError {
  readonly name: string = 'MissingContent';
}

/** Raised when plain text is requested from multi-part content. */
export class StructuredContent extends ChatWireError {
  readonly name: string = 'StructuredContent';
  constructor(public readonly parts: number) {
    super(`content is structured (${parts} parts), not plain text`);
  }
}

export class TransportError extends ChatWireError {
  readonly name: string = 'TransportError';
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Non-2xx HTTP status. `body` is the raw response text. */
export class ApiError extends ChatWireError {
  readonly name: string = 'ApiError';
  constructor(public readonly statusCode: number, public readonly body: string) {
    super(`API error (HTTP ${statusCode}): ${body}`);
  }
}

/** 2xx status with a body that is not a chat completion. */
export class DeserializationError extends ChatWireError {
  readonly name: string = 'DeserializationError';
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
